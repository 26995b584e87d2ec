export type PipelineStep =
  | 'script'
  | 'audio'
  | 'captions'
  | 'search terms'
  | 'footage'
  | 'render'
  | 'upload';

export class PipelineError extends Error {
  constructor(
    readonly step: PipelineStep,
    cause: unknown,
  ) {
    super(`${step} failed: ${describeError(cause)}`, { cause });
    this.name = 'PipelineError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  return String(err);
}
