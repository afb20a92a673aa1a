import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'dotenv';

/**
 * Variables from a dotenv file, or null when the file does not exist.
 * Comment lines and blank lines are skipped by the parser.
 */
export function readEnvFile(filePath: string): Record<string, string> | null {
  if (!existsSync(filePath)) return null;
  return parse(readFileSync(filePath));
}
