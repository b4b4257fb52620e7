/**
 * Cartesian product of per-position choices, last position varying fastest.
 *
 * Zero positions yield a single empty row.
 */
export function odometer<T>(choices: ReadonlyArray<readonly T[]>): T[][] {
  let rows: T[][] = [[]]

  for (const options of choices) {
    const next: T[][] = []

    for (const row of rows) {
      for (const option of options) {
        next.push([...row, option])
      }
    }

    rows = next
  }

  return rows
}
