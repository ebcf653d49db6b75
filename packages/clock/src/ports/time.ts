/**
 * A span or instant measured in milliseconds.
 *
 * Instants are only meaningful relative to other instants read from the same
 * {@link Clock}; they are not Unix timestamps.
 */
export type Milliseconds = number
