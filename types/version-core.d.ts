/** Numeric `major.minor.patch` triple. */
export interface VersionCore {
  major: number
  minor: number
  patch: number
}
