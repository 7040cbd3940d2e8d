/**
 * Schema for YAML option declaration files.
 *
 * ```yaml
 * options:
 *   count:
 *     names: [long, short]
 *     type: integer
 *     default: 1
 *   files:
 *     arity: array
 *     parsing: upToNextOption
 *   verbose:
 *     arity: flag
 * ```
 */
import { z } from 'zod';
import { ARRAY_STRATEGIES, SINGLE_VALUE_STRATEGIES } from '../definitions/types.js';

export const NameSpecSchema = z.union([
  z.literal('long'),
  z.literal('short'),
  z.object({
    long: z.string().min(1),
    single_dash: z.boolean().optional(),
  }),
  z.object({
    short: z.string().min(1),
  }),
]);

export const ValueTypeSchema = z.enum(['string', 'integer', 'number', 'boolean', 'choice']);

export const ParsingStrategySchema = z.enum([
  'next',
  'unconditional',
  'scanningForValue',
  'singleValue',
  'unconditionalSingleValue',
  'upToNextOption',
  'remaining',
]);

export const OptionDeclarationSchema = z
  .object({
    arity: z.enum(['single', 'array', 'flag']).default('single'),
    names: z.array(NameSpecSchema).min(1).optional(),
    parsing: ParsingStrategySchema.optional(),
    type: ValueTypeSchema.default('string'),
    choices: z.array(z.string()).optional(),
    default: z.union([z.string(), z.number(), z.boolean()]).optional(),
    required: z.boolean().default(false),
    catch_all: z.boolean().default(false),
    help: z.string().optional(),
  })
  .superRefine((decl, ctx) => {
    if (decl.type === 'choice' && (!decl.choices || decl.choices.length === 0)) {
      ctx.addIssue({ code: 'custom', message: "type 'choice' needs a non-empty 'choices' list", path: ['choices'] });
    }
    if (decl.parsing !== undefined) {
      const allowed: readonly string[] =
        decl.arity === 'single' ? SINGLE_VALUE_STRATEGIES : decl.arity === 'array' ? ARRAY_STRATEGIES : [];
      if (!allowed.includes(decl.parsing)) {
        ctx.addIssue({
          code: 'custom',
          message: `parsing '${decl.parsing}' does not apply to arity '${decl.arity}'`,
          path: ['parsing'],
        });
      }
    }
    if (decl.arity === 'array' && decl.default !== undefined) {
      ctx.addIssue({ code: 'custom', message: 'array options always default to an empty list', path: ['default'] });
    }
    if (decl.arity === 'flag' && decl.default !== undefined && typeof decl.default !== 'boolean') {
      ctx.addIssue({ code: 'custom', message: 'flag defaults must be true or false', path: ['default'] });
    }
    if (decl.required && decl.arity !== 'single') {
      ctx.addIssue({ code: 'custom', message: 'only single options can be required', path: ['required'] });
    }
    if (decl.catch_all && decl.arity !== 'array') {
      ctx.addIssue({ code: 'custom', message: 'only array options can be catch-all', path: ['catch_all'] });
    }
  });

export const DeclarationDocumentSchema = z.object({
  options: z.record(z.string(), OptionDeclarationSchema),
});

export type NameSpec = z.infer<typeof NameSpecSchema>;
export type ValueType = z.infer<typeof ValueTypeSchema>;
export type OptionDeclarationEntry = z.infer<typeof OptionDeclarationSchema>;
export type DeclarationDocument = z.infer<typeof DeclarationDocumentSchema>;
