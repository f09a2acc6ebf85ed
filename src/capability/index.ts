export type { LanguageCapability, CapabilityRequest, RosterSnapshot } from './language-capability.js';
export { ClaudeCliCapability, DEFAULT_CLAUDE_CLI_CONFIG, type ClaudeCliConfig } from './claude-cli-capability.js';
export { parseJsonOutput, extractJsonCandidates, stripCodeFences } from './json-extract.js';
