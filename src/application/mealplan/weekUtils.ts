const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

/**
 * Get the Monday (start of week) for a given date.
 * Returns YYYY-MM-DD string.
 */
export function getWeekStart(date: Date = new Date()): string {
  const d = new Date(date)
  const day = d.getDay() // 0=Sun, 1=Mon, ...
  const diff = day === 0 ? -6 : 1 - day
  d.setDate(d.getDate() + diff)
  return formatDate(d)
}

/**
 * Offset a weekStart string by N weeks (+/-).
 */
export function offsetWeek(weekStart: string, weeks: number): string {
  const d = parseDate(weekStart)
  d.setDate(d.getDate() + weeks * 7)
  return formatDate(d)
}

/** True for a real calendar date in YYYY-MM-DD form that falls on a Monday. */
export function isWeekStart(value: string): boolean {
  if (!ISO_DATE.test(value)) return false
  const d = parseDate(value)
  return formatDate(d) === value && d.getDay() === 1
}

/**
 * Format a week range like "Feb 10 - Feb 16"
 */
export function formatWeekRange(weekStart: string): string {
  const start = parseDate(weekStart)
  const end = new Date(start)
  end.setDate(end.getDate() + 6)

  const startStr = start.toLocaleDateString('en-US', { month: 'short', day: 'numeric' })
  const endStr = end.toLocaleDateString('en-US', { month: 'short', day: 'numeric' })
  return `${startStr} - ${endStr}`
}

function formatDate(d: Date): string {
  const year = d.getFullYear()
  const month = String(d.getMonth() + 1).padStart(2, '0')
  const day = String(d.getDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

function parseDate(dateStr: string): Date {
  const [year, month, day] = dateStr.split('-').map(Number)
  return new Date(year, month - 1, day)
}
