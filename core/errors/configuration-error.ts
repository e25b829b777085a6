/** Invalid arguments or an environment the tool cannot run in. */
export class ConfigurationError extends Error {
  /**
   * Creates a new ConfigurationError.
   *
   * @param message - Description of the problem.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
