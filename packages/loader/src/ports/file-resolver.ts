/**
 * Reads the raw content behind a file reference.
 */
export interface FileResolver {
  /**
   * @param absolutePath Location of the resource file.
   * @returns Parsed content; a function when the file exports a producer.
   */
  load(absolutePath: string): Promise<unknown>
}
