const RX_UNSAFE = /[^A-Za-z0-9\-_().]/gu

export function sanitizeFilename(s: string): string {
  const cleaned = (s || '').replace(RX_UNSAFE, '_').replace(/^_+|_+$/g, '').slice(0, 200)
  return cleaned || 'unnamed'
}
