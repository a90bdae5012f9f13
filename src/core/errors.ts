export type ResearchErrorKind =
    | 'PreconditionFailure'
    | 'LaunchFailure'
    | 'NavigationFailure'
    | 'InteractionFailure'
    | 'ExtractionFailure'
    | 'UnknownTool'
    | 'SchemaMismatch'
    | 'LoopTerminatedWithoutAnswer'
    | 'OracleFailure'
    | 'RunCancelled';

/**
 * Base class for every failure the agent reports. `kind` is the discriminant
 * callers switch on; `message` is safe to show to the oracle.
 */
export abstract class ResearchError extends Error {
    public abstract readonly kind: ResearchErrorKind;

    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
    }

    /** Rendering used in tool results: `<Kind>: <message>` */
    public describe(): string {
        return `${this.kind}: ${this.message}`;
    }
}

/** Session is in the wrong state for the requested operation. */
export class PreconditionFailure extends ResearchError {
    public readonly kind = 'PreconditionFailure';
}

export class LaunchFailure extends ResearchError {
    public readonly kind = 'LaunchFailure';
}

/** The engine could not reach the target or it never went quiet. */
export class NavigationFailure extends ResearchError {
    public readonly kind = 'NavigationFailure';
}

/** An expected element was absent or the interaction was rejected. */
export class InteractionFailure extends ResearchError {
    public readonly kind = 'InteractionFailure';
}

export class ExtractionFailure extends ResearchError {
    public readonly kind = 'ExtractionFailure';
}

export class UnknownTool extends ResearchError {
    public readonly kind = 'UnknownTool';
}

export class SchemaMismatch extends ResearchError {
    public readonly kind = 'SchemaMismatch';

    constructor(message: string, public readonly issues: string[]) {
        super(message);
    }
}

export class LoopTerminatedWithoutAnswer extends ResearchError {
    public readonly kind = 'LoopTerminatedWithoutAnswer';

    constructor(public readonly maxSteps: number) {
        super(`no final answer after ${maxSteps} step${maxSteps === 1 ? '' : 's'}`);
    }
}

export class OracleFailure extends ResearchError {
    public readonly kind = 'OracleFailure';
}

export class RunCancelled extends ResearchError {
    public readonly kind = 'RunCancelled';
}

export type Result<T, E = ResearchError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}
