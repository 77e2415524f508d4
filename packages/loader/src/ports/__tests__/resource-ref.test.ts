import { isResourceMap } from "../resource"
import { describeRef, fileRef, inlineRef, refKey } from "../resource-ref"

describe("resource refs", () => {
  it("caches by default", () => {
    expect(fileRef("/app/locales/es.json")).toEqual({
      kind: "file",
      path: "/app/locales/es.json",
      cache: true,
    })
    expect(inlineRef({}, { cache: false }).cache).toBe(false)
  })

  it("keys file refs by path and inline refs by source identity", () => {
    const messages = { hello: "Hola" }
    function loadRemote() {
      return messages
    }

    expect(refKey(fileRef("/app/locales/es.json"))).toBe("/app/locales/es.json")
    expect(refKey(inlineRef(messages))).toBe(messages)
    expect(refKey(inlineRef(loadRemote))).toBe(loadRemote)
  })

  it("describes sources for logs", () => {
    function loadRemote() {
      return {}
    }

    expect(describeRef(fileRef("/app/locales/es.json"))).toBe("/app/locales/es.json")
    expect(describeRef(inlineRef(loadRemote))).toBe("inline:loadRemote")
    expect(describeRef(inlineRef({ hello: "Hola" }))).toBe("inline:object")
  })

  it.each([
    [{}, true],
    [{ nested: { a: "b" } }, true],
    [[], false],
    [null, false],
    ["text", false],
    [7, false],
  ])("isResourceMap(%j) is %s", (value, expected) => {
    expect(isResourceMap(value)).toBe(expected)
  })
})
