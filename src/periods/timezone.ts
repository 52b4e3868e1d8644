export const UTC = 'UTC'

export class InvalidTimezoneError extends Error {
  constructor(readonly timeZone: string) {
    super(`Unknown timezone: "${timeZone}"`)
    this.name = 'InvalidTimezoneError'
  }
}

/**
 * Resolves an IANA timezone name, falling back to UTC when none is set.
 * Throws InvalidTimezoneError for names the runtime does not know.
 *
 * @example
 * resolveTimezone('Europe/Paris') // => 'Europe/Paris'
 * resolveTimezone(null)           // => 'UTC'
 */
export const resolveTimezone = (timeZone?: string | null): string => {
  if (!timeZone) return UTC

  try {
    return new Intl.DateTimeFormat('en-US', { timeZone }).resolvedOptions().timeZone
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidTimezoneError(timeZone)
    }
    throw error
  }
}
