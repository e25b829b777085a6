/** Unknown output format. */
export class FormatError extends Error {
  /**
   * Creates a new FormatError.
   *
   * @param format - The rejected format selector.
   */
  public constructor(format: string) {
    super(`Invalid format "${format}". Expected "json", "env", or "csv".`)
    this.name = 'FormatError'
  }
}
