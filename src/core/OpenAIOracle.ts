import { z } from 'zod';
import { DecisionOracle, OracleResponse } from './DecisionOracle';
import { ToolCallRequest, ToolDescriptor } from './CapabilityRegistry';
import { Turn } from './ConversationState';
import { ErrorClassifier } from './ErrorClassifier';
import { OracleFailure } from './errors';
import { buildResearchSystemPrompt } from './prompts/ResearchPrompt';
import { ErrorHandler } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

/** JSON Schema-based tool definition (OpenAI function calling format) */
export interface LLMToolDefinition {
    type: 'function';
    function: {
        name: string;
        description: string;
        parameters: {
            type: 'object';
            properties: Record<string, { type: string; description?: string }>;
            required: string[];
            additionalProperties: false;
        };
    };
}

interface LLMToolCallPayload {
    id: string;
    type: 'function';
    function: { name: string; arguments: string };
}

export type LLMMessage =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string | null; tool_calls?: LLMToolCallPayload[] }
    | { role: 'tool'; tool_call_id: string; content: string };

export interface OpenAIOracleOptions {
    apiKey?: string;
    modelName: string;
    /** Any OpenAI-compatible chat completions base URL. */
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    /** First backoff delay; doubles per retry. */
    retryDelayMs?: number;
    temperature?: number;
    systemPrompt?: (toolNames: readonly string[]) => string;
    fetchImpl?: typeof fetch;
}

export class OracleHttpError extends Error {
    constructor(public readonly status: number, body: string, retryAfterSeconds?: number) {
        const hint = retryAfterSeconds === undefined ? '' : ` (retry after ${retryAfterSeconds} seconds)`;
        super(`Oracle API Error: ${status} ${body.slice(0, 500)}${hint}`);
        this.name = 'OracleHttpError';
    }
}

const ChatCompletionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({
            content: z.string().nullable().optional(),
            tool_calls: z.array(z.object({
                id: z.string().optional(),
                function: z.object({
                    name: z.string(),
                    arguments: z.string().optional()
                })
            })).nullable().optional()
        })
    })).min(1)
});

export function toFunctionDefinitions(catalog: readonly ToolDescriptor[]): LLMToolDefinition[] {
    return catalog.map((tool): LLMToolDefinition => ({
        type: 'function',
        function: {
            name: tool.name,
            description: tool.description,
            parameters: {
                type: 'object',
                properties: Object.fromEntries(tool.parameters.map((p): [string, { type: string; description?: string }] => [p.name, { type: p.type, description: p.description }])),
                required: tool.parameters.filter(p => p.required).map(p => p.name),
                additionalProperties: false
            }
        }
    }));
}

/**
 * Turns the conversation into chat messages. Calls without a provider id
 * get a positional one so each tool message still pairs with its call.
 */
export function toChatMessages(history: readonly Turn[], systemPrompt: string): LLMMessage[] {
    const messages: LLMMessage[] = [{ role: 'system', content: systemPrompt }];
    let pendingIds: string[] = [];

    history.forEach((turn, index) => {
        switch (turn.kind) {
            case 'user_message':
                messages.push({ role: 'user', content: turn.text });
                break;
            case 'oracle_message':
                messages.push({ role: 'assistant', content: turn.text });
                break;
            case 'tool_call_batch':
                pendingIds = turn.calls.map((c, i) => c.callId ?? `call_${index}_${i}`);
                if (turn.calls.length === 0) break;
                messages.push({
                    role: 'assistant',
                    content: null,
                    tool_calls: turn.calls.map((c, i): LLMToolCallPayload => ({
                        id: pendingIds[i],
                        type: 'function',
                        function: { name: c.toolName, arguments: JSON.stringify(c.arguments) }
                    }))
                });
                break;
            case 'tool_result_batch':
                turn.results.forEach((r, i) => {
                    messages.push({
                        role: 'tool',
                        tool_call_id: r.callId ?? pendingIds[i] ?? `call_${index}_${i}`,
                        content: r.success ? r.payload : `ERROR: ${r.errorDetail ?? 'tool failed'}`
                    });
                });
                pendingIds = [];
                break;
        }
    });

    return messages;
}

function parseArguments(raw: string | undefined): Record<string, unknown> {
    if (!raw || !raw.trim()) return {};
    try {
        const parsed: unknown = JSON.parse(raw);
        if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
            return Object.fromEntries(Object.entries(parsed));
        }
        logger.warn(`OpenAIOracle: Tool arguments are not an object: ${raw.slice(0, 200)}`);
        return {};
    } catch (e) {
        // An empty object lets the registry report exactly which fields are missing
        logger.warn(`OpenAIOracle: Unparseable tool arguments (${ErrorClassifier.messageOf(e)}): ${raw.slice(0, 200)}`);
        return {};
    }
}

/**
 * Decision oracle backed by an OpenAI-compatible chat completions endpoint
 * with native tool calling.
 */
export class OpenAIOracle implements DecisionOracle {
    private fetchImpl: typeof fetch;

    constructor(private options: OpenAIOracleOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    public async decide(history: readonly Turn[], catalog: readonly ToolDescriptor[], signal?: AbortSignal): Promise<OracleResponse> {
        if (!this.options.apiKey) {
            throw new OracleFailure('no API key configured for the decision oracle (set OPENAI_API_KEY)');
        }

        const systemPrompt = (this.options.systemPrompt ?? buildResearchSystemPrompt)(catalog.map(t => t.name));
        const body = {
            model: this.options.modelName,
            messages: toChatMessages(history, systemPrompt),
            temperature: this.options.temperature ?? 0.2,
            ...(catalog.length > 0 ? { tools: toFunctionDefinitions(catalog) } : {})
        };

        try {
            const data = await ErrorHandler.withRetry(() => this.post(body, signal), {
                maxRetries: this.options.maxRetries,
                initialDelay: this.options.retryDelayMs ?? 1000,
                signal,
                retryCondition: (e) => e instanceof OracleHttpError
                    ? e.status === 429 || e.status >= 500
                    : ErrorClassifier.classify(e).retryable
            });
            return this.toResponse(data);
        } catch (e) {
            if (e instanceof OracleFailure) throw e;
            logger.error(`OpenAIOracle: Decision request failed: ${ErrorClassifier.messageOf(e)}`);
            throw new OracleFailure(`decision request failed: ${ErrorClassifier.messageOf(e)}`, e);
        }
    }

    private async post(body: object, signal?: AbortSignal): Promise<unknown> {
        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.options.timeoutMs);
        const onAbort = () => controller.abort();
        // An already-aborted signal never fires its abort event
        if (signal?.aborted) controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const response = await this.fetchImpl(`${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.options.apiKey}`
                },
                body: JSON.stringify(body),
                signal: controller.signal
            });

            if (!response.ok) {
                const retryAfter = Number(response.headers.get('retry-after') ?? '');
                throw new OracleHttpError(
                    response.status,
                    await response.text(),
                    Number.isInteger(retryAfter) && retryAfter > 0 ? retryAfter : undefined
                );
            }
            return await response.json();
        } catch (e) {
            if (timedOut) throw new Error(`oracle request timed out after ${this.options.timeoutMs}ms`);
            throw e;
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    private toResponse(data: unknown): OracleResponse {
        const parsed = ChatCompletionSchema.safeParse(data);
        if (!parsed.success) {
            throw new OracleFailure(`malformed response from the decision oracle: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
        }

        const message = parsed.data.choices[0].message;
        const rawCalls = message.tool_calls ?? [];
        if (rawCalls.length === 0) {
            return { kind: 'final_answer', text: (message.content ?? '').trim() };
        }

        const calls: ToolCallRequest[] = rawCalls.map(tc => ({
            callId: tc.id,
            toolName: tc.function.name,
            arguments: parseArguments(tc.function.arguments)
        }));
        if (message.content) {
            logger.debug(`OpenAIOracle: Reasoning alongside tool calls: ${message.content.slice(0, 300)}`);
        }
        logger.debug(`OpenAIOracle: ${calls.length} tool call(s) requested`);
        return { kind: 'tool_calls', calls };
    }
}
