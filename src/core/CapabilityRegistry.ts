import { z } from 'zod';
import { ErrorClassifier } from './ErrorClassifier';
import { ResearchError, Result, SchemaMismatch, UnknownTool } from './errors';
import { logger } from '../utils/logger';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean';

export interface ToolParameter {
    readonly name: string;
    readonly type: ParameterType;
    readonly required: boolean;
    readonly description: string;
}

/** What the oracle sees of a capability. Frozen at registration. */
export interface ToolDescriptor {
    readonly name: string;
    readonly description: string;
    readonly parameters: readonly ToolParameter[];
}

export interface ToolCallRequest {
    /** Provider-assigned id, echoed back on the matching result. */
    callId?: string;
    toolName: string;
    arguments: Record<string, unknown>;
}

export interface ToolCallResult {
    callId?: string;
    toolName: string;
    success: boolean;
    payload: string;
    errorDetail?: string;
}

export type CapabilityArgs<S extends z.ZodRawShape> = z.objectOutputType<S, z.ZodTypeAny, 'strict'>;

export type CapabilityHandler<S extends z.ZodRawShape> = (args: CapabilityArgs<S>) => Promise<Result<string>>;

export interface CapabilityDefinition<S extends z.ZodRawShape> {
    name: string;
    description: string;
    /** Argument shape; `.describe()` on each field becomes the parameter description. */
    args: S;
}

type Invocation =
    | { kind: 'invalid'; issues: string[] }
    | { kind: 'ran'; outcome: Result<string> };

interface RegisteredCapability {
    descriptor: ToolDescriptor;
    invoke(args: Record<string, unknown>): Promise<Invocation>;
}

export class DuplicateCapabilityError extends Error {
    constructor(name: string) {
        super(`capability "${name}" is already registered`);
        this.name = 'DuplicateCapabilityError';
    }
}

const NAME_PATTERN = /^[a-z][a-z0-9_]{0,63}$/;

export const UNKNOWN_TOOL_DETAIL = 'unknown tool';

/**
 * The full set of actions the oracle may invoke, and the one place where
 * every tool failure is turned into a ToolCallResult.
 */
export class CapabilityRegistry {
    private capabilities: Map<string, RegisteredCapability> = new Map();

    public register<S extends z.ZodRawShape>(definition: CapabilityDefinition<S>, handler: CapabilityHandler<S>): ToolDescriptor {
        const { name, description } = definition;
        if (!NAME_PATTERN.test(name)) {
            throw new Error(`invalid capability name "${name}": use lowercase letters, digits and underscores`);
        }
        if (this.capabilities.has(name)) {
            throw new DuplicateCapabilityError(name);
        }

        const descriptor: ToolDescriptor = Object.freeze({
            name,
            description,
            parameters: Object.freeze(Object.entries(definition.args).map(([param, schema]) => describeParameter(name, param, schema)))
        });

        const schema = z.object(definition.args).strict();
        this.capabilities.set(name, {
            descriptor,
            invoke: async (args) => {
                const parsed = schema.safeParse(args);
                if (!parsed.success) {
                    return { kind: 'invalid', issues: formatIssues(name, parsed.error) };
                }
                return { kind: 'ran', outcome: await handler(parsed.data) };
            }
        });

        logger.debug(`CapabilityRegistry: Registered ${name} (${descriptor.parameters.length} parameter(s))`);
        return descriptor;
    }

    public has(name: string): boolean {
        return this.capabilities.has(name);
    }

    public get size(): number {
        return this.capabilities.size;
    }

    public describe(name: string): ToolDescriptor | undefined {
        return this.capabilities.get(name)?.descriptor;
    }

    /** Descriptors in registration order. */
    public catalog(): ToolDescriptor[] {
        return Array.from(this.capabilities.values(), c => c.descriptor);
    }

    /**
     * Runs one request. Never throws: unknown names, bad arguments, failed
     * operations and unexpected exceptions all come back as `success: false`.
     */
    public async dispatch(request: ToolCallRequest): Promise<ToolCallResult> {
        const base = { callId: request.callId, toolName: request.toolName };
        const capability = this.capabilities.get(request.toolName);
        if (!capability) {
            const missing = new UnknownTool(UNKNOWN_TOOL_DETAIL);
            logger.warn(`CapabilityRegistry: Oracle asked for unknown tool "${request.toolName}"`);
            return { ...base, success: false, payload: '', errorDetail: missing.message };
        }

        logger.info(`CapabilityRegistry: -> ${request.toolName} ${JSON.stringify(request.arguments)}`);
        try {
            const invocation = await capability.invoke(request.arguments);
            if (invocation.kind === 'invalid') {
                const mismatch = new SchemaMismatch(`invalid arguments: ${invocation.issues.join('; ')}`, invocation.issues);
                logger.warn(`CapabilityRegistry: ${request.toolName} rejected: ${mismatch.message}`);
                return { ...base, success: false, payload: '', errorDetail: mismatch.message };
            }

            const { outcome } = invocation;
            if (!outcome.ok) {
                logger.warn(`CapabilityRegistry: ${request.toolName} failed: ${outcome.error.describe()}`);
                return { ...base, success: false, payload: '', errorDetail: outcome.error.describe() };
            }
            return { ...base, success: true, payload: outcome.value };
        } catch (e) {
            // Raw text stays in the log; the oracle only gets the category
            logger.error(`CapabilityRegistry: ${request.toolName} threw: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
            const detail = e instanceof ResearchError ? e.describe() : ErrorClassifier.sanitize(e);
            return { ...base, success: false, payload: '', errorDetail: detail };
        }
    }
}

function describeParameter(tool: string, name: string, schema: z.ZodTypeAny): ToolParameter {
    let inner: z.ZodTypeAny = schema;
    let required = true;
    while (inner instanceof z.ZodOptional || inner instanceof z.ZodDefault) {
        required = false;
        inner = inner instanceof z.ZodOptional ? inner.unwrap() : inner.removeDefault();
    }

    let type: ParameterType;
    if (inner instanceof z.ZodString) {
        type = 'string';
    } else if (inner instanceof z.ZodBoolean) {
        type = 'boolean';
    } else if (inner instanceof z.ZodNumber) {
        type = inner.isInt ? 'integer' : 'number';
    } else {
        throw new Error(`capability "${tool}": parameter "${name}" must be a string, number or boolean`);
    }

    return Object.freeze({ name, type, required, description: schema.description ?? inner.description ?? '' });
}

function formatIssues(tool: string, error: z.ZodError): string[] {
    const issues: string[] = [];
    for (const issue of error.issues) {
        const field = issue.path.join('.') || '(arguments)';
        if (issue.code === z.ZodIssueCode.unrecognized_keys) {
            for (const key of issue.keys) issues.push(`${key}: not a parameter of ${tool}`);
        } else if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
            issues.push(`${field}: required`);
        } else if (issue.code === z.ZodIssueCode.invalid_type) {
            issues.push(`${field}: expected ${issue.expected}, got ${issue.received}`);
        } else {
            issues.push(`${field}: ${issue.message}`);
        }
    }
    return issues;
}
