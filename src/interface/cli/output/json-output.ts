/**
 * JSON output mode for --json flag
 */

export function printJson(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + '\n');
}

export function printJsonError(error: {
  code?: string;
  message: string;
  cause?: string;
  hint?: string;
}): void {
  printJson({ error });
}

/** JSON on stdout with --json, otherwise the human rendering unless --quiet */
export function printResult<T>(
  globals: { json: boolean; quiet: boolean },
  data: T,
  render: (data: T) => void,
): void {
  if (globals.json) {
    printJson(data);
  } else if (!globals.quiet) {
    render(data);
  }
}
