export const QUIT_KEYWORD = 'quit';

export function isQuitCommand(line: string): boolean {
  return line.trim().toLowerCase() === QUIT_KEYWORD;
}

/**
 * Split a line like " London, ,Paris " into ["London", "Paris"].
 */
export function parseCityInput(line: string): string[] {
  return line
    .split(',')
    .map((city) => city.trim())
    .filter((city) => city.length > 0);
}
