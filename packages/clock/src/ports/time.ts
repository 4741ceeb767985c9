/** A duration or instant expressed in milliseconds. */
export type Milliseconds = number
