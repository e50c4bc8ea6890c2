import { z } from 'zod';

/** JSON Schema handed to the judge alongside the files. */
export const FINDINGS_JSON_SCHEMA = {
  type: 'object',
  properties: {
    findings: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          severity: { type: 'string', enum: ['high', 'medium', 'low'] },
          file: { type: 'string' },
          line: { type: ['integer', 'null'] },
          title: { type: 'string' },
          description: { type: 'string' },
          suggestion: { type: ['string', 'null'] },
          focus: { type: ['string', 'null'] },
        },
        required: ['severity', 'file', 'title', 'description'],
      },
    },
  },
  required: ['findings'],
} as const;

export const rawFindingSchema = z.object({
  severity: z.enum(['high', 'medium', 'low']),
  file: z.string().min(1),
  line: z.number().int().nullish(),
  title: z.string().min(1),
  description: z.string(),
  suggestion: z.string().nullish(),
  focus: z.string().nullish(),
});

export const findingsPayloadSchema = z.object({
  findings: z.array(rawFindingSchema),
});

export type RawFinding = z.infer<typeof rawFindingSchema>;
