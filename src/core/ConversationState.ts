import { ToolCallRequest, ToolCallResult } from './CapabilityRegistry';

export type Turn =
    | { readonly kind: 'user_message'; readonly text: string }
    | { readonly kind: 'oracle_message'; readonly text: string }
    | { readonly kind: 'tool_call_batch'; readonly calls: readonly ToolCallRequest[] }
    | { readonly kind: 'tool_result_batch'; readonly results: readonly ToolCallResult[] };

export type TurnKind = Turn['kind'];

/**
 * Ordered, append-only record of a run. It is the oracle's entire memory
 * and the run's audit trail, so turns are frozen on the way in.
 */
export class ConversationState implements Iterable<Turn> {
    private turns: Turn[] = [];

    public appendUserMessage(text: string): Turn {
        return this.append({ kind: 'user_message', text });
    }

    public appendOracleMessage(text: string): Turn {
        return this.append({ kind: 'oracle_message', text });
    }

    public appendToolCalls(calls: readonly ToolCallRequest[]): Turn {
        const copied = calls.map(c => Object.freeze({ ...c, arguments: Object.freeze({ ...c.arguments }) }));
        return this.append({ kind: 'tool_call_batch', calls: Object.freeze(copied) });
    }

    public appendToolResults(results: readonly ToolCallResult[]): Turn {
        const copied = results.map(r => Object.freeze({ ...r }));
        return this.append({ kind: 'tool_result_batch', results: Object.freeze(copied) });
    }

    public get size(): number {
        return this.turns.length;
    }

    public snapshot(): readonly Turn[] {
        return Object.freeze([...this.turns]);
    }

    public last(): Turn | undefined {
        return this.turns[this.turns.length - 1];
    }

    public countOf(kind: TurnKind): number {
        return this.turns.filter(t => t.kind === kind).length;
    }

    public [Symbol.iterator](): Iterator<Turn> {
        return this.snapshot()[Symbol.iterator]();
    }

    private append(turn: Turn): Turn {
        const frozen = Object.freeze(turn);
        this.turns.push(frozen);
        return frozen;
    }
}

/** One-line rendering for audit listings and debug logs. */
export function summarizeTurn(turn: Turn, maxLength: number = 120): string {
    const clip = (text: string) => text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
    switch (turn.kind) {
        case 'user_message':
            return `user: ${clip(turn.text)}`;
        case 'oracle_message':
            return `oracle: ${clip(turn.text)}`;
        case 'tool_call_batch':
            return `calls: ${turn.calls.map(c => `${c.toolName}(${JSON.stringify(c.arguments)})`).join(', ')}`;
        case 'tool_result_batch':
            return `results: ${turn.results.map(r => `${r.toolName} ${r.success ? 'ok' : `failed (${r.errorDetail ?? 'no detail'})`}`).join(', ')}`;
    }
}
