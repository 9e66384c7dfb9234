export function canonicalUrl(url: string): string {
  try {
    const u = new URL(url)
    const params = new URLSearchParams(u.search)
    for (const key of Array.from(params.keys())) {
      if (
        key.startsWith('utm_') ||
        ['fbclid', 'gclid', 'mc_cid', 'mc_eid', 'ref', 'refsrc'].includes(key)
      )
        params.delete(key)
    }
    u.search = params.toString()
    u.hash = ''
    return u.toString()
  } catch {
    return url
  }
}

export function stripHtml(s: string | null | undefined): string {
  return (s || '')
    .replace(/<[^>]*>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/** http(s) only; data: URIs and relative paths are rejected */
export function isHttpUrl(value: string | null | undefined): value is string {
  if (!value) return false
  try {
    const u = new URL(value)
    return u.protocol === 'http:' || u.protocol === 'https:'
  } catch {
    return false
  }
}

export function shortHash(s: string): string {
  return hashNumber(s).toString(36)
}

function hashNumber(s: string): number {
  let h = 5381
  for (let i = 0; i < s.length; i++) h = ((h << 5) + h) ^ s.charCodeAt(i)
  return h >>> 0
}

/**
 * Deterministic placeholder image for articles without a usable image.
 * Colours and the label suffix both derive from the article identity.
 */
export function placeholderImageUrl(categoryLabel: string, identity: string) {
  const h = hashNumber(identity)
  const bg = (h & 0xffffff).toString(16).padStart(6, '0')
  const fg = (~h & 0xffffff).toString(16).padStart(6, '0')
  const text = encodeURIComponent(`${categoryLabel} ${shortHash(identity)}`)
  return `https://placehold.co/600x400/${bg}/${fg}?text=${text.replace(/%20/g, '+')}`
}
