export function charLength(value: string): number {
  return [...value].length;
}
