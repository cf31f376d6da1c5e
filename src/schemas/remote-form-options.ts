/**
 * Shape checks for RemoteForm options.
 *
 * Names that do not belong to the form are a soft condition handled by the
 * field selector; these schemas only reject values of the wrong kind.
 */

import { z } from 'zod';
import { RemoteFormOptionsError } from '../core/errors.js';

const FieldNameList = z.union([z.array(z.string()), z.set(z.string())]);

const FieldsetOptionsSchema = z
  .object({
    fields: z.array(z.string()).optional(),
  })
  .passthrough();

const FieldsetDeclarationSchema = z.array(z.tuple([z.string(), FieldsetOptionsSchema]));

const RemoteFormDirectivesSchema = z.object({
  exclude: FieldNameList.optional(),
  include: FieldNameList.optional(),
  readonly: FieldNameList.optional(),
  ordering: z.array(z.string()).optional(),
  fieldsets: FieldsetDeclarationSchema.optional(),
});

/**
 * @throws {RemoteFormOptionsError} Listing every offending option path
 */
export function assertValidDirectives(directives: unknown): void {
  const result = RemoteFormDirectivesSchema.safeParse(directives);
  if (!result.success) {
    throw new RemoteFormOptionsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
}
