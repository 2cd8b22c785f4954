import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { AdRecord } from '../core/types.js';
import { PreconditionFailedError, type PreconditionViolation } from '../core/errors.js';

/**
 * JSON Schema validation for pipeline inputs and upstream payloads
 */

// ajv ships CommonJS; under NodeNext the class sits on the default export's `default`
const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  strict: false, // Allow additional properties
});

/**
 * Validation Result
 */
export interface ValidationResult {
  valid: boolean;
  errors?: ErrorObject[];
}

/**
 * Format validation errors as a readable string
 */
export function formatErrors(errors?: ErrorObject[] | null): string {
  if (!errors || errors.length === 0) {
    return 'No errors';
  }

  return errors
    .map((error) => {
      const path = error.instancePath || 'root';
      const message = error.message || 'validation failed';
      return `${path}: ${message}`;
    })
    .join('; ');
}

const adRecordSchema = {
  type: 'object',
  required: ['title', 'snippet', 'displayed_link'],
  properties: {
    title: { type: 'string' },
    snippet: { type: 'string' },
    displayed_link: { type: 'string' },
    extensions: { type: 'string' },
  },
};

const validateAdRecord: ValidateFunction<AdRecord> = ajv.compile<AdRecord>(adRecordSchema);

function violatedFields(errors: ErrorObject[] | null | undefined): string[] {
  const fields = new Set<string>();
  for (const error of errors ?? []) {
    if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
      fields.add(error.params.missingProperty);
    } else if (error.instancePath) {
      fields.add(error.instancePath.replace(/^\//, ''));
    }
  }
  return [...fields];
}

/**
 * Validate raw input rows as AdRecords
 *
 * Every row must expose title, snippet and displayed_link (case-sensitive).
 * Any violation fails the whole batch. Columns outside the AdRecord shape
 * are dropped.
 */
export function validateAdRecords(rows: ReadonlyArray<Record<string, unknown>>): AdRecord[] {
  const violations: PreconditionViolation[] = [];
  const records: AdRecord[] = [];

  rows.forEach((row, index) => {
    if (!validateAdRecord(row)) {
      violations.push({ row: index + 1, missingFields: violatedFields(validateAdRecord.errors) });
      return;
    }

    records.push({
      title: row.title,
      snippet: row.snippet,
      displayed_link: row.displayed_link,
      ...(row.extensions !== undefined ? { extensions: row.extensions } : {}),
    });
  });

  if (violations.length > 0) {
    throw new PreconditionFailedError(violations);
  }

  return records;
}

/**
 * Key-info payload returned by the upstream quota endpoint
 */
export interface KeyInfoPayload {
  data: {
    rate_limit: {
      requests: number;
      interval: string;
    };
  };
}

const keyInfoSchema = {
  type: 'object',
  required: ['data'],
  properties: {
    data: {
      type: 'object',
      required: ['rate_limit'],
      properties: {
        rate_limit: {
          type: 'object',
          required: ['requests', 'interval'],
          properties: {
            requests: { type: 'integer' },
            interval: { type: 'string' },
          },
        },
      },
    },
  },
};

const validateKeyInfo: ValidateFunction<KeyInfoPayload> = ajv.compile<KeyInfoPayload>(keyInfoSchema);

export function checkKeyInfoPayload(data: unknown): data is KeyInfoPayload {
  return validateKeyInfo(data);
}

export function keyInfoErrors(): string {
  return formatErrors(validateKeyInfo.errors);
}

/** Safety cap: refuse to parse content this large (likely truncated/malformed) */
export const MAX_CONTENT_LENGTH = 100000;

/**
 * Extract and parse JSON content from a model response
 *
 * Tries, in order: the whole text, a ```json fenced block, and the span
 * from the first `{` to the last `}`. The brace span only counts when it
 * holds a non-empty object.
 */
export function extractJsonFromResponse(content: string): unknown {
  if (content.length > MAX_CONTENT_LENGTH) {
    throw new Error(`response too large (${content.length} chars)`);
  }

  try {
    return JSON.parse(content);
  } catch {
    const jsonBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
    if (jsonBlockMatch) {
      try {
        return JSON.parse(jsonBlockMatch[1]);
      } catch {
        // Fall through to brace span
      }
    }

    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start !== -1 && end > start) {
      try {
        const candidate: unknown = JSON.parse(content.slice(start, end + 1));
        // An empty object inside prose is not an answer
        if (typeof candidate === 'object' && candidate !== null && Object.keys(candidate).length > 0) {
          return candidate;
        }
      } catch {
        // Fall through
      }
    }

    throw new Error('no JSON object found in response');
  }
}
