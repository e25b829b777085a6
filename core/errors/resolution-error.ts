/** Git metadata that cannot be read or does not add up to a version. */
export class ResolutionError extends Error {
  /**
   * Creates a new ResolutionError.
   *
   * @param message - Description of the problem.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'ResolutionError'
  }
}
