const CURRENCY_CODE = /^[a-z]{3}$/i

/**
 * Formats an amount in minor units (cents) for display.
 * Units that are not ISO currency codes are appended after the number.
 *
 * @example
 * asMoney(123456, 'usd')    // => '$1,234.56'
 * asMoney(-5000, 'eur')     // => '-€50.00'
 * asMoney(2500, 'credits')  // => '25.00 credits'
 */
export const asMoney = (amount: number, unit: string): string => {
  const major = amount / 100

  if (!CURRENCY_CODE.test(unit)) {
    return `${major.toFixed(2)} ${unit}`
  }

  return major.toLocaleString('en-US', {
    style: 'currency',
    currency: unit.toUpperCase(),
  })
}
