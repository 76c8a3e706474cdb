// packages/shard-targets/src/errors.ts

export type ShardTargetsStage = 'load' | 'decode' | 'callback' | 'save';

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * Every failure of load/update surfaces as one of these.
 * `file` is set for storage stages.
 */
export class ShardTargetsError extends Error {
  readonly stage: ShardTargetsStage;
  readonly file?: string;

  constructor(args: { stage: ShardTargetsStage; context: string; file?: string; cause: unknown }) {
    const where = args.file ? `${args.context} ${args.file}` : args.context;
    super(`${where}: ${causeMessage(args.cause)}`, { cause: args.cause });
    this.name = 'ShardTargetsError';
    this.stage = args.stage;
    this.file = args.file;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
