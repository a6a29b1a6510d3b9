export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Length in code points, so a surrogate pair counts as one character. */
export function characterLength(text: string): number {
  return [...text].length;
}

export function sliceCharacters(text: string, maxLength: number): string {
  const characters = [...text];
  return characters.length <= maxLength ? text : characters.slice(0, maxLength).join('');
}

export function truncate(text: string, maxLength: number): string {
  const characters = [...text];
  if (characters.length <= maxLength) {
    return text;
  }

  return `${characters.slice(0, maxLength - 1).join('')}…`;
}

export function containsIgnoringCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}
