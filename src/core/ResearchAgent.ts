import { CapabilityRegistry } from './CapabilityRegistry';
import { Turn } from './ConversationState';
import { DecisionOracle } from './DecisionOracle';
import { OpenAIOracle } from './OpenAIOracle';
import { OrchestrationLoop, RunOutcome } from './OrchestrationLoop';
import { ResearchError } from './errors';
import { AgentConfig } from '../config/ConfigManager';
import { BrowserDriver } from '../tools/BrowserDriver';
import { BrowserSession } from '../tools/BrowserSession';
import { PlaywrightDriver } from '../tools/PlaywrightDriver';
import { getSearchEngineProfile } from '../tools/SearchEngineProfile';
import { registerBrowserCapabilities } from '../tools/browserCapabilities';
import { logger } from '../utils/logger';

/** Thrown by runResearch when a run ends without an answer. */
export class ResearchRunError extends Error {
    constructor(public readonly reason: ResearchError, public readonly steps: number) {
        super(`Research run failed after ${steps} step(s): ${reason.describe()}`);
        this.name = 'ResearchRunError';
    }
}

export interface ResearchAgentDeps {
    oracle?: DecisionOracle;
    /** A new driver per run; each run owns its browser. */
    driverFactory?: () => BrowserDriver;
}

/**
 * Caller-facing entry point. Every run gets its own session, registry and
 * loop; nothing is shared between runs except configuration.
 */
export class ResearchAgent {
    private oracle: DecisionOracle;
    private driverFactory: () => BrowserDriver;
    private lastTurns: readonly Turn[] = [];
    private activeRun: AbortController | null = null;

    constructor(private config: AgentConfig, deps: ResearchAgentDeps = {}) {
        this.oracle = deps.oracle ?? new OpenAIOracle({
            apiKey: config.openaiApiKey,
            modelName: config.modelName,
            baseUrl: config.oracleBaseUrl,
            timeoutMs: config.oracleTimeoutMs,
            maxRetries: config.oracleMaxRetries
        });
        this.driverFactory = deps.driverFactory ?? (() => new PlaywrightDriver());
    }

    public async runResearch(instruction: string): Promise<string> {
        const outcome = await this.run(instruction);
        if (!outcome.ok) throw new ResearchRunError(outcome.error, outcome.steps);
        return outcome.answer;
    }

    /** Same as runResearch, but reports failure as a value. */
    public async run(instruction: string): Promise<RunOutcome> {
        if (this.activeRun) {
            throw new Error('research run already in progress');
        }
        const trimmed = instruction.trim();
        if (!trimmed) {
            throw new Error('research instruction is empty');
        }

        const controller = new AbortController();
        this.activeRun = controller;
        let loop: OrchestrationLoop | null = null;
        try {
            const session = new BrowserSession(this.driverFactory(), {
                headless: this.config.headless,
                navigationTimeoutMs: this.config.navigationTimeoutMs,
                selectorTimeoutMs: this.config.selectorTimeoutMs,
                contentCharBudget: this.config.contentCharBudget,
                minContentLength: this.config.minContentLength,
                maxSearchResults: this.config.maxSearchResults,
                profile: getSearchEngineProfile(this.config.searchEngine)
            });
            const registry = new CapabilityRegistry();
            registerBrowserCapabilities(registry, session);
            loop = new OrchestrationLoop(this.oracle, registry, session);

            logger.info(`ResearchAgent: Starting research (maxSteps=${this.config.maxSteps}): ${trimmed}`);
            return await loop.run(trimmed, { maxSteps: this.config.maxSteps, signal: controller.signal });
        } finally {
            this.lastTurns = loop ? loop.conversation.snapshot() : [];
            this.activeRun = null;
        }
    }

    /** Requests cancellation; the run stops at the next step boundary and still closes the browser. */
    public cancel(): boolean {
        if (!this.activeRun) return false;
        logger.warn('ResearchAgent: Cancellation requested');
        this.activeRun.abort();
        return true;
    }

    public get running(): boolean {
        return this.activeRun !== null;
    }

    /** Turns of the most recent run, in order. */
    public turns(): readonly Turn[] {
        return this.lastTurns;
    }
}
