/** Version component advanced by a single run. */
export type IncrementKind = 'major' | 'minor' | 'patch'
