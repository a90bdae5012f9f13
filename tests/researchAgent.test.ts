import { describe, expect, it } from 'vitest';
import { AgentConfigSchema } from '../src/config/ConfigManager';
import { finalAnswer, toolCalls } from '../src/core/DecisionOracle';
import { ResearchAgent, ResearchRunError } from '../src/core/ResearchAgent';
import { FakeBrowserDriver } from './fakes/FakeBrowserDriver';
import { ScriptedOracle } from './fakes/ScriptedOracle';

function agentWith(oracle: ScriptedOracle, overrides: Record<string, unknown> = {}) {
    const drivers: FakeBrowserDriver[] = [];
    const config = AgentConfigSchema.parse({ maxSteps: 4, ...overrides });
    const agent = new ResearchAgent(config, {
        oracle,
        driverFactory: () => {
            const driver = new FakeBrowserDriver({ results: [{ title: 'Alpha', url: 'https://a.test/' }] });
            drivers.push(driver);
            return driver;
        }
    });
    return { agent, drivers };
}

describe('ResearchAgent', () => {
    it('should return the answer and expose the turns of the run', async () => {
        const oracle = new ScriptedOracle([
            toolCalls({ toolName: 'navigate_to_search_engine', arguments: {} }),
            finalAnswer('Alpha is the answer.')
        ]);
        const { agent, drivers } = agentWith(oracle);

        const answer = await agent.runResearch('  which one?  ');

        expect(answer).toBe('Alpha is the answer.');
        expect(agent.turns().map(t => t.kind)).toEqual(['user_message', 'tool_call_batch', 'tool_result_batch', 'oracle_message']);
        expect(agent.turns()[0]).toEqual({ kind: 'user_message', text: 'which one?' });
        expect(drivers).toHaveLength(1);
        expect(drivers[0].calls.slice(-3)).toEqual(['close page', 'close browser', 'dispose']);
        expect(agent.running).toBe(false);
    });

    it('should throw ResearchRunError carrying the reason when the budget runs out', async () => {
        const oracle = new ScriptedOracle([], toolCalls({ toolName: 'browser_status', arguments: {} }));
        const { agent, drivers } = agentWith(oracle, { maxSteps: 2 });

        const failure = await agent.runResearch('never answers').catch((e: unknown) => e);

        expect(failure).toBeInstanceOf(ResearchRunError);
        if (failure instanceof ResearchRunError) {
            expect(failure.reason.kind).toBe('LoopTerminatedWithoutAnswer');
            expect(failure.steps).toBe(2);
            expect(failure.message).toBe('Research run failed after 2 step(s): LoopTerminatedWithoutAnswer: no final answer after 2 steps');
        }
        expect(agent.turns()).toHaveLength(5);
        expect(drivers[0].calls).toContain('dispose');
    });

    it('should apply browser settings from the configuration', async () => {
        const oracle = new ScriptedOracle([
            toolCalls({ toolName: 'navigate_to_search_engine', arguments: {} }),
            finalAnswer('done')
        ]);
        const { agent, drivers } = agentWith(oracle, { headless: false, searchEngine: 'bing' });

        await agent.runResearch('question');

        expect(drivers[0].launchOptions[0]).toEqual({ headless: false, timeoutMs: 30000 });
        expect(drivers[0].calls).toContain('goto https://www.bing.com/ networkidle');
    });

    it('should use a fresh browser for every run', async () => {
        const oracle = new ScriptedOracle([finalAnswer('first'), finalAnswer('second')]);
        const { agent, drivers } = agentWith(oracle);

        await agent.runResearch('one');
        await agent.runResearch('two');

        expect(drivers).toHaveLength(2);
        expect(agent.turns()).toEqual([
            { kind: 'user_message', text: 'two' },
            { kind: 'oracle_message', text: 'second' }
        ]);
    });

    it('should reject an empty instruction', async () => {
        const { agent, drivers } = agentWith(new ScriptedOracle([]));

        await expect(agent.runResearch('   ')).rejects.toThrow('research instruction is empty');
        expect(drivers).toHaveLength(0);
    });

    it('should refuse a second run while one is active and honour cancellation', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });
        const oracle = new ScriptedOracle([
            async () => {
                await gate;
                return toolCalls({ toolName: 'browser_status', arguments: {} });
            }
        ], finalAnswer('too late'));
        const { agent, drivers } = agentWith(oracle);

        const first = agent.run('slow question');
        await expect(agent.run('another')).rejects.toThrow('research run already in progress');
        expect(agent.running).toBe(true);

        expect(agent.cancel()).toBe(true);
        release();
        const outcome = await first;

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe('RunCancelled');
            expect(outcome.steps).toBe(1);
        }
        expect(oracle.callCount).toBe(1);
        expect(drivers[0].calls).toContain('dispose');
        expect(agent.cancel()).toBe(false);
    });

    it('should accept a new run after one failed to start', async () => {
        const config = AgentConfigSchema.parse({ maxSteps: 2 });
        let attempts = 0;
        const agent = new ResearchAgent(config, {
            oracle: new ScriptedOracle([finalAnswer('second try worked')]),
            driverFactory: () => {
                attempts++;
                if (attempts === 1) throw new Error('no driver');
                return new FakeBrowserDriver();
            }
        });

        await expect(agent.runResearch('question')).rejects.toThrow('no driver');
        expect(agent.running).toBe(false);
        expect(agent.turns()).toEqual([]);

        await expect(agent.runResearch('question')).resolves.toBe('second try worked');
    });
});
