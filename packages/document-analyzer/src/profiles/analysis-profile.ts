import { z } from 'zod';

import { deepFreeze } from '../utils/deep-freeze';
import { AnalysisProfileError } from './analysis-profile-error';

const fieldKeySchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'must be an identifier');

const scoreRangeSchema = z
  .object({ min: z.number(), max: z.number() })
  .refine((range) => range.min < range.max, 'min must be below max');

const textFieldSchema = z.object({
  key: fieldKeySchema,
  description: z.string().min(1),
});

const listFieldSchema = textFieldSchema.extend({
  delimiter: z.enum([';', ',']),
});

const ratingFieldSchema = textFieldSchema.extend({
  range: scoreRangeSchema,
});

const analysisProfileSchema = z
  .object({
    id: z.string().min(1),
    documentLabel: z.string().min(1),
    unitLabel: z.string().min(1),
    minWords: z.number().int().min(1),
    unitNameStyle: z.enum(['verbatim', 'title-case']),
    instructions: z.object({
      identification: z.string().min(1),
      evaluation: z.string().min(1),
      holistic: z.string().min(1),
    }),
    evaluationScoreRange: scoreRangeSchema,
    holistic: z.object({
      summaryDescription: z.string().min(1),
      lists: z.array(listFieldSchema),
      narratives: z.array(textFieldSchema),
      qualities: z.array(textFieldSchema),
      rating: ratingFieldSchema.optional(),
    }),
  })
  .superRefine((profile, ctx) => {
    const { lists, narratives, qualities, rating } = profile.holistic;
    const keys = [
      ...lists.map((field) => field.key),
      ...narratives.map((field) => field.key),
      ...qualities.map((field) => field.key),
      ...(rating ? [rating.key] : []),
    ];
    const seen = new Set<string>(['summary']);

    for (const key of keys) {
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['holistic'],
          message: `duplicate holistic field key "${key}"`,
        });
      }
      seen.add(key);
    }
  });

/**
 * Describes one document domain: what the units are called, how each
 * stage is instructed and which holistic fields are produced.
 */
export type AnalysisProfile = z.infer<typeof analysisProfileSchema>;

export type UnitNameStyle = AnalysisProfile['unitNameStyle'];
export type HolisticFields = AnalysisProfile['holistic'];
export type HolisticListField = HolisticFields['lists'][number];
export type HolisticTextField = HolisticFields['narratives'][number];

/**
 * Validate a profile definition and return it deeply frozen.
 *
 * @throws {AnalysisProfileError} When the definition is invalid
 */
export function defineAnalysisProfile(
  definition: AnalysisProfile,
): AnalysisProfile {
  const parsed = analysisProfileSchema.safeParse(definition);
  if (!parsed.success) {
    throw new AnalysisProfileError(
      `Invalid analysis profile "${definition.id}"`,
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }
  return deepFreeze(parsed.data);
}
