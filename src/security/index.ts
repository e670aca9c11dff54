/**
 * Security helpers shared by the monitor and the trend job.
 *
 * Provides:
 * - Log sanitization (tokens and secrets never reach the log files or the sink's debug field)
 * - Schema-validated JSON file reads
 */

import * as fs from 'fs';
import { z } from 'zod';

// ===========================================
// LOG SANITIZATION
// ===========================================

const SENSITIVE_PATTERNS = [
  // API keys and tokens
  { pattern: /Bearer\s+[A-Za-z0-9\-_.]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /api[_-]?key["']?\s*[:=]\s*["']?[A-Za-z0-9\-_.]+/gi, replacement: 'apiKey: [REDACTED]' },
  // Airtable personal access tokens
  { pattern: /\bpat[A-Za-z0-9]{14}\.[a-f0-9]{64}\b/g, replacement: '[REDACTED_PAT]' },

  // Passwords and secrets
  { pattern: /password["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'password: [REDACTED]' },
  { pattern: /secret["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'secret: [REDACTED]' },

  // Email addresses
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL_REDACTED]' },
];

const SENSITIVE_KEYS = ['apikey', 'api_key', 'password', 'secret', 'token', 'authorization', 'pat'];

export function sanitizeLogData(data: unknown): unknown {
  if (typeof data === 'string') {
    let sanitized = data;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeLogData(item));
  }

  if (typeof data === 'object' && data !== null) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEYS.includes(key.toLowerCase())) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeLogData(value);
      }
    }
    return sanitized;
  }

  return data;
}

// ===========================================
// SAFE FILE OPERATIONS
// ===========================================

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Safe JSON parse with schema validation
 */
export function safeParseJSON<T>(jsonString: string, schema: Schema<T>): ValidationResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (error) {
    return { success: false, error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: issues };
  }
  return { success: true, data: result.data };
}

/**
 * Safe file read with JSON validation
 */
export function safeReadJSONFile<T>(filePath: string, schema: Schema<T>): ValidationResult<T> {
  try {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File not found' };
    }

    const stats = fs.lstatSync(filePath);
    if (stats.isSymbolicLink()) {
      return { success: false, error: 'Symlinks not allowed' };
    }

    const content = fs.readFileSync(filePath, 'utf8');
    return safeParseJSON(content, schema);
  } catch (error) {
    return { success: false, error: `File read error: ${error instanceof Error ? error.message : String(error)}` };
  }
}
