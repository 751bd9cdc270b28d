/** Duration in milliseconds. */
export type Milliseconds = number

/** Absolute instant as milliseconds since the Unix epoch. */
export type UnixMs = number
