export const MESSAGE_SEPARATOR = '---MSG---';

export function splitMessages(input: string, separator: string = MESSAGE_SEPARATOR): string[] {
  return input
    .split(separator)
    .map((part) => part.trim())
    .filter(Boolean);
}
