export type { CommandKind, CommandPayload, ValidationOutcome, SequenceValidation, SequenceTable, ButtonTable } from './types';
export { COMMAND_KINDS, CONDITIONAL_KINDS, MULTIZONE_MARKER } from './types';
export type { Clock } from './parser';
export { SequenceParser, DEFAULT_PARSER_LIMITS } from './parser';
export type { ConditionNode } from './expression';
export { parseCondition, evaluateNode, evaluateCondition } from './expression';
export type { ConditionalFrame } from './conditional';
export { ConditionalContext } from './conditional';
export type { ExpansionResult } from './expander';
export { MacroExpander, DEFAULT_MAX_EXPANSION_DEPTH } from './expander';
export type { ValidatorOptions } from './validator';
export { CommandValidator } from './validator';
export type { SearchMode, IndexStats } from './search-index';
export { SearchIndex, SEARCH_MODES, BUTTON_OWNER_PREFIX, extractKeywords } from './search-index';
export type { SequenceManagerOptions, ExecuteOptions, SequenceInfo, LoadResult, ManagerStatistics } from './manager';
export { SequenceManager } from './manager';
