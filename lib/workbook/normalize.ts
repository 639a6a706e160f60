const RX_CONTROL = /[\x00-\x1f\x7f]+/g

export function cleanHeaderText(s: string | null | undefined): string {
  if (!s) return ''
  return s
    .replace(RX_CONTROL, ' ')
    .replace(/\u00a0/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

const RX_EDGE_SEPARATORS = /^[\s/\-–—:;,.]+|[\s/\-–—:;,.]+$/g

export function trimSeparators(s: string): string {
  return (s || '').replace(RX_EDGE_SEPARATORS, '')
}
