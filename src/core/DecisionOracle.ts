import { ToolCallRequest, ToolDescriptor } from './CapabilityRegistry';
import { Turn } from './ConversationState';

export type OracleResponse =
    | { kind: 'final_answer'; text: string }
    | { kind: 'tool_calls'; calls: ToolCallRequest[] };

/**
 * The reasoning engine that picks the next capability. The loop only relies
 * on this contract, so a scripted stand-in can replace a live model.
 */
export interface DecisionOracle {
    decide(history: readonly Turn[], catalog: readonly ToolDescriptor[], signal?: AbortSignal): Promise<OracleResponse>;
}

export function finalAnswer(text: string): OracleResponse {
    return { kind: 'final_answer', text };
}

export function toolCalls(...calls: ToolCallRequest[]): OracleResponse {
    return { kind: 'tool_calls', calls };
}
