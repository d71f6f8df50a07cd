// Zod schemas for manifest validation

import { z } from 'zod';

const NonEmpty = z.string().trim().min(1);

/**
 * Fields shared by every check item
 */
const ItemBase = {
  label: NonEmpty.optional(),
  expected: z.boolean().default(true),
  blocking: z.boolean().default(false)
};

/**
 * Regular expression source; rejected early when it does not compile
 */
const RegexSource = NonEmpty.refine(source => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}, 'Invalid regular expression');

export const CheckItemSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('function'), name: NonEmpty, ...ItemBase }),
  z.object({ kind: z.literal('class'), name: NonEmpty, ...ItemBase }),
  z.object({ kind: z.literal('registration'), name: NonEmpty, ...ItemBase }),
  z.object({
    kind: z.literal('literal'),
    anyOf: z.union([NonEmpty.transform(value => [value]), z.array(NonEmpty).min(1)]),
    ...ItemBase
  }),
  z.object({ kind: z.literal('inclusion'), module: NonEmpty, ...ItemBase }),
  z.object({ kind: z.literal('pattern'), pattern: RegexSource, ...ItemBase })
]);

/**
 * Relative artifact path; absolute paths and parent traversal are refused
 */
const ArtifactPathSchema = NonEmpty
  .refine(p => !/^[/\\]/.test(p) && !/^[a-zA-Z]:/.test(p), 'Artifact path must be relative')
  .refine(p => !p.split(/[/\\]/).includes('..'), 'Artifact path must stay inside the root');

export const CheckTargetSchema = z.object({
  path: ArtifactPathSchema,
  label: NonEmpty.optional(),
  items: z.array(CheckItemSchema).default([])
});

export const CheckSpecSchema = z.object({
  name: NonEmpty,
  title: NonEmpty.optional(),
  shortCircuit: z.boolean().default(true),
  targets: z.array(CheckTargetSchema).min(1, 'A component needs at least one target')
});

export const SyntaxSchema = z.object({
  registrationCall: NonEmpty.default('torch.class'),
  classNamespace: NonEmpty.default('nn'),
  inclusionCall: NonEmpty.default('require'),
  moduleNamespace: NonEmpty.default('nngraph')
});

export const ManifestSchema = z.object({
  name: NonEmpty,
  syntax: SyntaxSchema.default({}),
  components: z.array(CheckSpecSchema).min(1, 'A manifest needs at least one component')
    .refine(
      components => new Set(components.map(c => c.name)).size === components.length,
      'Component names must be unique'
    ),
  summary: z.array(NonEmpty).default([])
});

export type CheckItemInput = z.infer<typeof CheckItemSchema>;
export type ManifestInput = z.infer<typeof ManifestSchema>;

/**
 * Format zod issues as `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
