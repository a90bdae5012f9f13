#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import path from 'path';
import os from 'os';
import yaml from 'yaml';
import { ConfigManager, ConfigError } from '../config/ConfigManager';
import { ResearchAgent, ResearchRunError } from '../core/ResearchAgent';
import { summarizeTurn } from '../core/ConversationState';
import { SEARCH_ENGINE_NAMES, SearchEngineName } from '../tools/SearchEngineProfile';
import { logger } from '../utils/logger';

dotenv.config(); // Local .env
dotenv.config({ path: path.join(os.homedir(), '.sleuth', '.env') }); // Global .env

process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Promise rejection: ${reason}`);
});

function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return n;
}

function parseEngine(value: string): SearchEngineName {
    const match = SEARCH_ENGINE_NAMES.find(name => name === value.toLowerCase());
    if (!match) {
        throw new InvalidArgumentError(`Choose one of: ${SEARCH_ENGINE_NAMES.join(', ')}.`);
    }
    return match;
}

interface ResearchCommandOptions {
    config?: string;
    maxSteps?: number;
    headful?: boolean;
    engine?: SearchEngineName;
    showTurns?: boolean;
}

const program = new Command();

program
    .name('sleuth')
    .description('Autonomous web research agent')
    .version('0.1.0');

program
    .command('research')
    .description('Research a question with a live browser and print the answer')
    .argument('<instruction...>', 'What to research')
    .option('-c, --config <path>', 'Config file to use')
    .option('-m, --max-steps <n>', 'Maximum oracle round-trips', parsePositiveInt)
    .option('--headful', 'Show the browser window')
    .option('-e, --engine <name>', `Search engine (${SEARCH_ENGINE_NAMES.join(', ')})`, parseEngine)
    .option('--show-turns', 'Print the conversation turns after the run')
    .action(async (words: string[], options: ResearchCommandOptions) => {
        const configManager = new ConfigManager({ configPath: options.config });
        const config = configManager.withOverrides({
            maxSteps: options.maxSteps,
            headless: options.headful ? false : undefined,
            searchEngine: options.engine
        });
        const agent = new ResearchAgent(config);

        const onSigint = () => {
            if (agent.cancel()) {
                console.error('\nCancelling after the current step (browser will be closed)...');
            } else {
                process.exit(130);
            }
        };
        process.on('SIGINT', onSigint);

        try {
            const answer = await agent.runResearch(words.join(' '));
            console.log(answer);
        } catch (e) {
            if (!(e instanceof ResearchRunError)) throw e;
            console.error(`Research failed: ${e.reason.describe()}`);
            process.exitCode = 1;
        } finally {
            process.off('SIGINT', onSigint);
            if (options.showTurns) {
                console.log('\n--- Turns ---');
                agent.turns().forEach((turn, i) => console.log(`${String(i + 1).padStart(2)}. ${summarizeTurn(turn)}`));
            }
        }
    });

program
    .command('config')
    .description('Print the effective configuration (secrets masked)')
    .option('-c, --config <path>', 'Config file to use')
    .action((options: { config?: string }) => {
        const configManager = new ConfigManager({ configPath: options.config });
        console.log(`# source: ${configManager.getSource() ?? 'defaults + environment'}`);
        console.log(yaml.stringify(configManager.toDisplay()).trimEnd());
    });

program.parseAsync(process.argv).catch((e: unknown) => {
    if (e instanceof ConfigError) {
        console.error(e.message);
    } else {
        logger.error(`sleuth: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
    }
    process.exitCode = 1;
});
