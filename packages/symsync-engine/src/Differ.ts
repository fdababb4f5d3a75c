import { collapseWhitespace } from './internal/format.js'

/** Whitespace-insensitive form, used only to classify changes. */
export const normalize = (text: string): string => collapseWhitespace(text)

export const equal = (a: string, b: string): boolean => normalize(a) === normalize(b)
