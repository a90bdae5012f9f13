import { CapabilityRegistry, ToolCallResult } from './CapabilityRegistry';
import { ConversationState, summarizeTurn } from './ConversationState';
import { DecisionOracle, OracleResponse } from './DecisionOracle';
import { ErrorClassifier } from './ErrorClassifier';
import { LoopTerminatedWithoutAnswer, OracleFailure, ResearchError, RunCancelled } from './errors';
import { logger } from '../utils/logger';

export interface ClosableSession {
    close(): Promise<unknown>;
}

export interface RunOptions {
    maxSteps: number;
    /** Observed between steps; an aborted signal ends the run with RunCancelled. */
    signal?: AbortSignal;
}

export type RunOutcome =
    | { ok: true; answer: string; steps: number }
    | { ok: false; error: ResearchError; steps: number };

export const DEFAULT_MAX_STEPS = 10;

/**
 * Drives one research run: ask the oracle, execute what it asks for in the
 * order given, record everything, repeat. Which tools get called is the
 * oracle's business; the loop only guarantees ordering, bookkeeping and that
 * the session is closed exactly once however the run ends.
 */
export class OrchestrationLoop {
    public readonly conversation = new ConversationState();
    private started = false;

    constructor(
        private oracle: DecisionOracle,
        private registry: CapabilityRegistry,
        private session: ClosableSession
    ) { }

    public async run(instruction: string, options: RunOptions): Promise<RunOutcome> {
        if (this.started) {
            throw new Error('OrchestrationLoop.run may only be called once per loop');
        }
        this.started = true;

        const { maxSteps, signal } = options;
        let steps = 0;
        try {
            if (!Number.isInteger(maxSteps) || maxSteps < 1) {
                throw new RangeError(`maxSteps must be a positive integer, got ${maxSteps}`);
            }

            this.conversation.appendUserMessage(instruction);
            const catalog = this.registry.catalog();

            while (steps < maxSteps) {
                if (signal?.aborted) {
                    logger.warn(`OrchestrationLoop: Cancelled after ${steps} step(s)`);
                    return { ok: false, error: new RunCancelled(`run cancelled after ${steps} step(s)`), steps };
                }
                steps++;

                let response: OracleResponse;
                try {
                    response = await this.oracle.decide(this.conversation.snapshot(), catalog, signal);
                } catch (e) {
                    if (signal?.aborted) {
                        return { ok: false, error: new RunCancelled(`run cancelled during step ${steps}`, e), steps };
                    }
                    const failure = e instanceof OracleFailure
                        ? e
                        : new OracleFailure(`decision oracle failed: ${ErrorClassifier.messageOf(e)}`, e);
                    logger.error(`OrchestrationLoop: Step ${steps}: ${failure.describe()}`);
                    return { ok: false, error: failure, steps };
                }

                if (response.kind === 'final_answer') {
                    this.conversation.appendOracleMessage(response.text);
                    logger.info(`OrchestrationLoop: Final answer after ${steps} step(s)`);
                    return { ok: true, answer: response.text, steps };
                }

                const callTurn = this.conversation.appendToolCalls(response.calls);
                logger.info(`OrchestrationLoop: Step ${steps}/${maxSteps} ${summarizeTurn(callTurn)}`);

                // Sequential on purpose: later calls act on the page earlier ones left
                const results: ToolCallResult[] = [];
                for (const call of response.calls) {
                    results.push(await this.registry.dispatch(call));
                }
                const resultTurn = this.conversation.appendToolResults(results);
                logger.debug(`OrchestrationLoop: ${summarizeTurn(resultTurn)}`);
            }

            const exhausted = new LoopTerminatedWithoutAnswer(maxSteps);
            logger.warn(`OrchestrationLoop: ${exhausted.describe()}`);
            return { ok: false, error: exhausted, steps };
        } finally {
            await this.closeSession();
        }
    }

    private async closeSession(): Promise<void> {
        try {
            await this.session.close();
        } catch (e) {
            logger.error(`OrchestrationLoop: Session close failed: ${ErrorClassifier.messageOf(e)}`);
        }
    }
}
