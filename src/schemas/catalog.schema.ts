import { z } from 'zod';

const weightSchema = z.number().finite().nonnegative();

export const metricDirectionSchema = z.enum(['higher_better', 'lower_better', 'target_band']);

export const metricDefinitionInputSchema = z
  .object({
    metricId: z.string().min(1).max(128),
    pillarId: z.string().min(1).max(64),
    name: z.string().min(1).max(255).optional(),
    description: z.string().max(2000).nullable().optional(),
    direction: metricDirectionSchema,
    weight: weightSchema.nullable().optional(),
    targetMin: z.number().finite().nullable().optional(),
    targetMax: z.number().finite().nullable().optional()
  })
  .superRefine((value, ctx) => {
    const hasMin = value.targetMin !== null && value.targetMin !== undefined;
    const hasMax = value.targetMax !== null && value.targetMax !== undefined;
    if (value.direction !== 'target_band') {
      if (hasMin || hasMax) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['direction'],
          message: 'targetMin/targetMax are only allowed for target_band metrics'
        });
      }
      return;
    }
    if (!hasMin || !hasMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [hasMin ? 'targetMax' : 'targetMin'],
        message: 'target_band metrics require targetMin and targetMax'
      });
      return;
    }
    if ((value.targetMin ?? 0) >= (value.targetMax ?? 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['targetMax'],
        message: 'targetMax must be greater than targetMin'
      });
    }
  });

export const pillarDefinitionInputSchema = z.object({
  pillarId: z.string().min(1).max(64),
  name: z.string().min(1).max(255),
  description: z.string().max(2000).nullable().optional(),
  weight: weightSchema.nullable().optional()
});

export const catalogFileSchema = z.object({
  pillars: z.array(z.unknown()),
  metrics: z.array(z.unknown())
});

export type MetricDefinitionInput = z.infer<typeof metricDefinitionInputSchema>;
export type PillarDefinitionInput = z.infer<typeof pillarDefinitionInputSchema>;
