/**
 * @fileoverview Shared command plumbing: parsed flags and the service handle.
 */

import type { ResearchService } from '../api/service.js';
import { createError } from './errors.js';

export interface CommandFlags {
  json: boolean;
  stream: boolean;
  maxSources?: string;
  maxResults?: string;
  metadata?: string;
  corpus?: string;
  documents: string[];
}

export interface CommandContext {
  service: ResearchService;
  /** Positional arguments after the command name. */
  args: string[];
  flags: CommandFlags;
}

export function parseIntegerFlag(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw createError('INVALID_ARGUMENT', `${flag} expects an integer, got "${value}"`);
  }
  return parsed;
}

export function requireArgument(args: string[], name: string, usage: string): string {
  const value = args.join(' ').trim();
  if (value.length === 0) {
    throw createError('INVALID_ARGUMENT', `${name} is required. Usage: ${usage}`);
  }
  return value;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
