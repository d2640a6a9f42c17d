import { z } from 'zod';
import type {
  AnchorReference,
  IssueType,
  SearchQuery,
  VqlDocument,
} from './types.js';
import { ValidationError } from './types.js';

export const ISSUE_TYPES = [
  'mislabels',
  'outliers',
  'duplicates',
  'blur',
  'dark',
  'bright',
  'normal',
] as const satisfies readonly IssueType[];

const unitInterval = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .finite(`${name} must be finite`)
    .min(0, `${name} must be between 0 and 1`)
    .max(1, `${name} must be between 0 and 1`);

const issueFilterSchema = z
  .object({
    issueType: z.enum(ISSUE_TYPES, {
      errorMap: () => ({ message: `issueType must be one of: ${ISSUE_TYPES.join(', ')}` }),
    }),
    confidenceMin: unitInterval('confidenceMin'),
    confidenceMax: unitInterval('confidenceMax'),
  })
  .refine((value) => value.confidenceMin <= value.confidenceMax, {
    message: 'confidenceMin must not exceed confidenceMax',
  });

function validate<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

function requireTerms(terms: string[], name: string): void {
  if (terms.length === 0) {
    throw new ValidationError(`At least one ${name} is required`);
  }
}

/**
 * Translate a search intent into the VQL document the API accepts.
 * Exactly one filter family ends up in the result.
 *
 * @throws ValidationError on malformed input. Raw `vql` queries are
 * returned untouched and never validated.
 */
export function buildQuery(query: SearchQuery): VqlDocument {
  switch (query.kind) {
    case 'labels':
      requireTerms(query.labels, 'label');
      return [{ labels: { op: 'one_of', value: [...query.labels] } }];

    case 'captions':
      requireTerms(query.captions, 'caption');
      return [{ text: { op: 'fts', value: query.captions.join(' ') } }];

    case 'issues': {
      const { issueType, confidenceMin, confidenceMax } = validate(issueFilterSchema, query);
      return [
        {
          issues: {
            op: 'issue',
            value: issueType,
            confidence_min: confidenceMin,
            confidence_max: confidenceMax,
            mode: 'in',
          },
        },
      ];
    }

    case 'similarity': {
      const threshold = validate(unitInterval('threshold'), query.threshold);
      return [
        {
          similarity: {
            op: 'upload',
            value: query.anchor.anchorMediaId,
            anchor_type: query.anchor.anchorType,
            threshold: String(threshold),
          },
        },
      ];
    }

    case 'vql':
      return query.filters;
  }
}

// ------------------------------------------------------------
// Constructors
// ------------------------------------------------------------

export const labelQuery = (labels: string[]): SearchQuery => ({ kind: 'labels', labels });

export const captionQuery = (captions: string[]): SearchQuery => ({ kind: 'captions', captions });

export const issueQuery = (
  issueType: IssueType,
  confidenceMin = 0.8,
  confidenceMax = 1
): SearchQuery => ({ kind: 'issues', issueType, confidenceMin, confidenceMax });

export const similarityQuery = (anchor: AnchorReference, threshold = 0): SearchQuery => ({
  kind: 'similarity',
  anchor,
  threshold,
});

export const vqlQuery = (filters: VqlDocument): SearchQuery => ({ kind: 'vql', filters });
