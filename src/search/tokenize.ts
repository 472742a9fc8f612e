/** Lowercased maximal runs of letters, digits and underscore. Shared by indexing and querying. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
}
