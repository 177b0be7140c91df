export function percentOf(part: number, whole: number): number {
  if (whole <= 0) {
    return 0;
  }
  return (part * 100) / whole;
}
