/**
 * Typed errors for the import pipeline.
 *
 * Every failure is fatal for the run; the category only decides how the
 * entry point reports it. `context` is logged as structured fields.
 */

export type ErrorCategory =
  | 'configuration' // bad flags, env, workspace path
  | 'planning'      // index resolution and plan folder writes
  | 'transformation' // markdown to storage format conversion
  | 'remote';       // Confluence REST calls

export class ImportError extends Error {
  constructor(
    message: string,
    readonly category: ErrorCategory,
    readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ImportError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'configuration', context);
  }
}

export class PlanningError extends ImportError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'planning', context, options);
  }
}

export class MissingIndexError extends PlanningError {
  constructor(readonly indexPath: string) {
    super(`The index file of the workspace cannot be found at ${indexPath}`, { indexPath });
  }
}

export class PlanExistsError extends PlanningError {
  constructor(readonly planDir: string) {
    super(`Previous plan detected under ${planDir}. Remove the plan folder and run again`, { planDir });
  }
}

export class MissingPlanError extends PlanningError {
  constructor(readonly planDir: string) {
    super(`No plan found under ${planDir}. Run the plan command first`, { planDir });
  }
}

export class InvalidIndexEntryError extends PlanningError {
  constructor(readonly indexPath: string, readonly line: number, readonly text: string) {
    super(`Line ${line} of ${indexPath} is not an index entry`, { indexPath, line, text });
  }
}

export class UnresolvedReferenceError extends PlanningError {
  constructor(readonly reference: string, readonly candidates: string[], readonly indexPath: string) {
    super(`Cannot find markdown file ${reference}`, { reference, candidates, indexPath });
  }
}

export class CyclicIndexError extends PlanningError {
  constructor(readonly chain: string[]) {
    super(`Cyclic index reference: ${chain.join(' -> ')}`, { chain });
  }
}

export class FootnoteExtractionError extends ImportError {
  constructor(readonly footnoteId: string, readonly definition: string) {
    super(`Footnote [^${footnoteId}] has no link target`, 'transformation', { footnoteId, definition });
  }
}

export class RemoteApiError extends ImportError {
  constructor(
    message: string,
    context: { method?: string; url?: string; status?: number; response?: unknown } = {},
    options?: { cause?: unknown }
  ) {
    super(message, 'remote', context, options);
  }
}

/**
 * Flatten any thrown value into log fields.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof ImportError) {
    return { name: error.name, category: error.category, ...error.context };
  }
  if (error instanceof Error) {
    return { name: error.name };
  }
  return { value: String(error) };
}
