/**
 * Joins lines with `\n`, so expected documents can be written one line per
 * array entry with their indentation visible.
 */
export function lines(...rows: string[]): string {
  return rows.join('\n');
}
