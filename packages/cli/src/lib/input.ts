/**
 * Host name sources for the CLI: positional arguments or piped stdin.
 *
 * Stdin is read lazily, one line at a time, so names produced by a slow
 * upstream command are queried as they arrive. Each line is either a bare
 * host name or a JSON object carrying one (see HOST_NAME_FIELDS), which
 * lets the output of inventory tools, or of `uptime-probe --json`, be piped
 * straight back in.
 */

import * as readline from "node:readline";
import {
  HOST_NAME_FIELDS,
  ValidationError,
  hostNameSchema,
  hostRecordSchema,
} from "@uptime-probe/shared";

/** Readable input that may or may not be a terminal */
export type HostInput = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Pick the host name source.
 *   - arguments given:         validated arguments
 *   - no arguments, piped in:  lazy stream of stdin lines
 *   - neither:                 undefined (the query falls back to the local host)
 */
export function resolveHostNames(
  args: string[],
  stdin: HostInput,
): Iterable<string> | AsyncIterable<string> | undefined {
  if (args.length > 0) {
    return args.map((arg, i) => validateHostName(arg, { argument: i + 1 }));
  }
  if (!stdin.isTTY) {
    return readHostNames(stdin);
  }
  return undefined;
}

/** Yield one host name per meaningful input line */
export async function* readHostNames(input: NodeJS.ReadableStream): AsyncGenerator<string> {
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      const name = parseHostLine(line, lineNumber);
      if (name !== undefined) {
        yield name;
      }
    }
  } finally {
    lines.close();
  }
}

/**
 * Parse a single input line.
 * Blank lines and `#` comments yield undefined.
 *
 * @throws ValidationError VALIDATION_INPUT_RECORD — bad JSON or no host field
 * @throws ValidationError VALIDATION_HOST_NAME — the name itself is invalid
 */
export function parseHostLine(line: string, lineNumber: number): string | undefined {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#")) {
    return undefined;
  }

  if (!trimmed.startsWith("{")) {
    return validateHostName(trimmed, { line: lineNumber });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    throw new ValidationError(
      `Line ${lineNumber} is not valid JSON`,
      "VALIDATION_INPUT_RECORD",
      { line: lineNumber, parseError: String(err) },
    );
  }

  const record = hostRecordSchema.safeParse(parsed);
  if (!record.success || record.data === undefined) {
    throw new ValidationError(
      `Line ${lineNumber} has no host name field (expected one of: ${HOST_NAME_FIELDS.join(", ")})`,
      "VALIDATION_INPUT_RECORD",
      { line: lineNumber },
    );
  }

  return validateHostName(record.data, { line: lineNumber });
}

/**
 * @throws ValidationError VALIDATION_HOST_NAME
 */
export function validateHostName(
  value: string,
  context: Record<string, unknown> = {},
): string {
  const result = hostNameSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Invalid host name "${value}": ${result.error.issues[0].message}`,
      "VALIDATION_HOST_NAME",
      { ...context, zodErrors: result.error.issues },
    );
  }
  return result.data;
}
