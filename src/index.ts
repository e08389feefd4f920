export { type EditloopConfig, DEFAULT_CONFIG, loadEditloopConfig } from './config/configuration';
export { FileSystemService } from './functions/storage/fileSystemService';
export { Git } from './functions/scm/git';
export { type AiSdkSenderOptions, createAiSdkSender, createOpenAiModel } from './llm/services/aiSdkSender';
export * from './swe/coder/coderTypes';
export { formatEditBlock, parseEditResponse } from './swe/coder/editBlockParser';
export { type ConfirmEdit, type EditConfirmationRequest, FileEditApplier, type FileEditApplierOptions } from './swe/coder/editApplier';
export { findSearchText, truncateSnapshot } from './swe/coder/editMatcher';
export { buildInitialPrompt, buildSystemPrompt } from './swe/coder/promptBuilder';
export { buildRoundFeedback } from './swe/coder/services/reflectionGenerator';
export {
	type ConversationState,
	type EditApplier,
	type SendMessage,
	type StopPolicy,
	SearchReplaceOrchestrator,
	type SearchReplaceOrchestratorOptions,
} from './swe/coder/searchReplaceOrchestrator';
export { TokenTracker, type TokenBudget, type TokenStatus } from './swe/coder/tokenTracker';
export type { ValidationIssue, ValidationRule } from './swe/coder/validators/validationRule';
export { ConfigurationError, PatchApplyError } from './swe/sweErrors';
