/**
 * Server log lines go to stderr with a bracketed component prefix,
 * e.g. "[director] listening on http://0.0.0.0:3000".
 */
export function log(message: string, component = 'director'): void {
  process.stderr.write(`[${component}] ${message}\n`);
}
