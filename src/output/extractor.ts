// Post-processor for tool output. The MCP client prints results inside its own
// log format, e.g.
//   content=[TextContent(type='text', text='Tool: get_issue, Result: {...}', annotations=None)]
// so the JSON has to be located by pattern and unescaped before it can be parsed.
// Structured output from the SDK transport skips the scraping and goes through
// formatToolText().
import { decodeUnicodeEscapes } from './unicode-escape.js';
import { addIsoTimestamps } from './timestamps.js';
import { parseJson, stringifyJson } from './json.js';

export const RESULT_PATTERN = /Result: ([{[][\s\S]*?[}\]])'(?:,\s*annotations|')/;

const LOG_MARKERS = [' - INFO - ', ' - WARNING - '];

export type FormattedResult =
  | { kind: 'json'; value: unknown; text: string }
  | { kind: 'unparsed'; raw: string; text: string }
  | { kind: 'raw'; text: string };

export interface FormatOptions {
  isoTimestamps?: boolean;
}

/** The `Result: ...` JSON embedded in client output, or null when there is none. */
export function extractResultText(output: string): string | null {
  const match = RESULT_PATTERN.exec(output);
  return match ? match[1] : null;
}

/**
 * Parse an extracted result. The escaped form is tried first; if unescaping or
 * parsing fails the text is parsed as it stands. Throws when neither parses.
 */
export function decodeResult(jsonText: string): unknown {
  try {
    return parseJson(decodeUnicodeEscapes(jsonText));
  } catch {
    return parseJson(jsonText);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Resource-style results (get_issue, get_issue_raw) wrap the payload as
 * `{ contents: [{ text: "<json>" }] }`. Return the parsed inner JSON, or the
 * value unchanged when it is not such an envelope or the inner text is not JSON.
 */
export function unwrapContents(data: unknown): unknown {
  if (!isRecord(data)) return data;
  const contents = data['contents'];
  if (!Array.isArray(contents) || contents.length === 0) return data;
  const first: unknown = contents[0];
  if (!isRecord(first) || typeof first['text'] !== 'string') return data;
  try {
    return parseJson(first['text']);
  } catch {
    return data;
  }
}

/** Non-blank lines that are not INFO/WARNING log records. */
export function filterLogLines(output: string): string[] {
  return output
    .split('\n')
    .filter(line => line.trim() !== '' && !LOG_MARKERS.some(marker => line.includes(marker)));
}

function render(value: unknown, options: FormatOptions): FormattedResult {
  const unwrapped = unwrapContents(value);
  const enriched = options.isoTimestamps ? addIsoTimestamps(unwrapped) : unwrapped;
  return { kind: 'json', value: enriched, text: stringifyJson(enriched, 2) };
}

/** Format the combined stdout/stderr captured from the MCP client CLI. */
export function formatCliOutput(output: string, options: FormatOptions = {}): FormattedResult {
  const jsonText = extractResultText(output);
  if (jsonText === null) {
    return { kind: 'raw', text: filterLogLines(output).join('\n') };
  }

  let value: unknown;
  try {
    value = decodeResult(jsonText);
  } catch {
    return { kind: 'unparsed', raw: jsonText, text: `Failed to parse JSON:\n${jsonText}` };
  }
  return render(value, options);
}

/** Format a tool's text content received as structured output. */
export function formatToolText(text: string, options: FormatOptions = {}): FormattedResult {
  let value: unknown;
  try {
    value = parseJson(text);
  } catch {
    return { kind: 'raw', text };
  }
  return render(value, options);
}
