/**
 * Cell value validity rule shared by both resolvers.
 *
 * NaN and negative values are no-data; zero is a real measurement.
 */
export function classifyCellValue(value: number | undefined): number | null {
  if (value === undefined || Number.isNaN(value) || value < 0) {
    return null;
  }
  return value;
}
