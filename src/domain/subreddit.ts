export function normalizeSubreddit(name: string): string {
  return name.trim().replace(/^\/?r\//i, '').trim()
}

// Reddit treats community names case-insensitively
export function profileKey(name: string): string {
  return normalizeSubreddit(name).toLowerCase()
}
