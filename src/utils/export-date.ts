// Health Auto Export writes "2026-10-18 09:12:33 +0800"; ISO 8601 strings are accepted as well.
const EXPORT_DATE_RE =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(\.\d+)?\s*(Z|[+-]\d{2}:?\d{2})?$/

export const parseExportDate = (raw: string | null | undefined): Date | null => {
  if (typeof raw !== 'string') return null
  const match = EXPORT_DATE_RE.exec(raw.trim())
  if (!match) return null

  const [, y, mo, d, h, mi, s, frac, zone] = match
  let offset = ''
  if (zone === undefined) {
    offset = ''
  } else if (zone === 'Z') {
    offset = 'Z'
  } else {
    const digits = zone.replace(':', '')
    offset = `${digits.slice(0, 3)}:${digits.slice(3)}`
  }

  const iso = `${y}-${mo}-${d}T${h}:${mi}:${s}${frac ?? ''}${offset}`
  const ms = Date.parse(iso)
  return Number.isFinite(ms) ? new Date(ms) : null
}
