/**
 * CLI output helpers.
 *
 * All output uses process.stdout/stderr.write for testability.
 * Plain text, no colors.
 */
export const output = {
  /** Write an informational message to stdout. */
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a success message to stdout, prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /**
   * Write rows under a header, each column padded to its widest cell and
   * separated by two spaces.
   */
  table(header: string[], rows: string[][]): void {
    const widths = header.map((title, i) =>
      Math.max(title.length, ...rows.map((row) => (row[i] ?? '').length)),
    )
    const line = (cells: string[]) =>
      widths.map((w, i) => (cells[i] ?? '').padEnd(w)).join('  ').trimEnd()
    process.stdout.write(line(header) + '\n')
    process.stdout.write(widths.map((w) => '-'.repeat(w)).join('  ') + '\n')
    for (const row of rows) {
      process.stdout.write(line(row) + '\n')
    }
  },
}
