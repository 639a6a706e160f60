// inclusive; empty when end < start
export function pageRange(start: number, end: number): number[] {
  const out: number[] = []
  for (let p = start; p <= end; p += 1) out.push(p)
  return out
}
