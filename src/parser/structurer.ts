import type { DatasetSchema, JsonValue, PreviousResult, Requirements, SessionContext, StructuredQuery } from '../ir/types.js';
import { schemaOf } from '../dataset/schema.js';
import { EmptyQueryError, StructuringError } from '../utils/errors.js';

const PRECISION_PATTERNS = [
  /\bround(?:ed)?\s+(?:it\s+|results?\s+|values?\s+)?to\s+(\d{1,2})\s+(?:decimal|decimals|decimal places|places|digits)\b/,
  /\b(\d{1,2})\s+decimal\s+places?\b/,
];
const DROP_MISSING = /\b(?:ignore|skip|drop|exclude)\s+(?:the\s+)?(?:missing|null|empty|blank)(?:\s+values)?\b/;
const KEEP_MISSING = /\b(?:include|keep)\s+(?:the\s+)?(?:missing|null|empty|blank)(?:\s+values)?\b/;
const FOCUS_COLUMN = /\b(?:use|focus on)\s+column\s+(?:"([^"]+)"|'([^']+)'|([\w.-]+))/i;

/**
 * Requirements stated explicitly in this query. Only keys found in the text
 * are returned; merging with the session's accumulated requirements happens
 * in `structure`.
 */
export function extractRequirements(text: string, schema: DatasetSchema | null): Record<string, JsonValue> {
  const lower = text.toLowerCase();
  const found: Record<string, JsonValue> = {};

  for (const pattern of PRECISION_PATTERNS) {
    const match = lower.match(pattern);
    if (match) {
      found.precision = Number(match[1]);
      break;
    }
  }

  if (DROP_MISSING.test(lower)) found.dropMissing = true;
  else if (KEEP_MISSING.test(lower)) found.dropMissing = false;

  const focus = text.match(FOCUS_COLUMN);
  if (focus) {
    const requested = focus[1] ?? focus[2] ?? focus[3];
    if (schema) {
      const column = schema.columns.find((c) => c.name.toLowerCase() === requested.toLowerCase());
      if (!column) {
        throw new StructuringError(`Column "${requested}" does not exist in ${schema.name}`, 'unknown-column');
      }
      found.column = column.name;
    } else {
      found.column = requested;
    }
  }

  return found;
}

function snapshotPrevious(context: SessionContext): PreviousResult | null {
  if (context.lastResult?.status !== 'success' || context.lastQuery === null) return null;
  return Object.freeze({ query: context.lastQuery, value: context.lastResult.value });
}

/**
 * Normalise raw text plus the session context into an immutable query.
 * The schema is copied at call time so a later reload cannot change what an
 * earlier turn recorded.
 */
export function structure(rawText: string, context: SessionContext): StructuredQuery {
  const queryText = rawText.replace(/\s+/g, ' ').trim();
  if (queryText === '') {
    throw new EmptyQueryError();
  }
  if (queryText.length > 2000) {
    throw new StructuringError('Query is longer than 2000 characters', 'query-too-long');
  }

  const schema = context.dataset ? schemaOf(context.dataset) : null;
  const requirements: Requirements = Object.freeze({
    ...context.requirements,
    ...extractRequirements(queryText, schema),
  });

  return Object.freeze({
    queryText,
    schema,
    requirements,
    previous: snapshotPrevious(context),
  });
}
