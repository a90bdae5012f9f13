export { ResearchAgent, ResearchRunError } from './core/ResearchAgent';
export type { ResearchAgentDeps } from './core/ResearchAgent';
export { OrchestrationLoop, DEFAULT_MAX_STEPS } from './core/OrchestrationLoop';
export type { RunOptions, RunOutcome, ClosableSession } from './core/OrchestrationLoop';
export { CapabilityRegistry, DuplicateCapabilityError, UNKNOWN_TOOL_DETAIL } from './core/CapabilityRegistry';
export type { ToolDescriptor, ToolParameter, ToolCallRequest, ToolCallResult, CapabilityDefinition } from './core/CapabilityRegistry';
export { ConversationState, summarizeTurn } from './core/ConversationState';
export type { Turn, TurnKind } from './core/ConversationState';
export { finalAnswer, toolCalls } from './core/DecisionOracle';
export type { DecisionOracle, OracleResponse } from './core/DecisionOracle';
export { OpenAIOracle } from './core/OpenAIOracle';
export * from './core/errors';
export { BrowserSession, CONTENT_SELECTORS, DEFAULT_SESSION_OPTIONS } from './tools/BrowserSession';
export type { SearchResult, PageContent, SessionState, BrowserSessionOptions } from './tools/BrowserSession';
export type { BrowserDriver, DriverBrowser, DriverPage } from './tools/BrowserDriver';
export { PlaywrightDriver } from './tools/PlaywrightDriver';
export { SEARCH_ENGINE_PROFILES, getSearchEngineProfile } from './tools/SearchEngineProfile';
export type { SearchEngineProfile, SearchEngineName } from './tools/SearchEngineProfile';
export { registerBrowserCapabilities } from './tools/browserCapabilities';
export { ConfigManager, ConfigError } from './config/ConfigManager';
export type { AgentConfig } from './config/ConfigManager';
