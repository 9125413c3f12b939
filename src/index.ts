export * from './errors.js';
export * from './types/schemas.js';

export { aceConfigSchema, defaultConfig, type AceConfig, type PolicyConfig, type RuleMode } from './config/schema.js';
export { loadConfig, loadRepoConfig, resolveConfigPath } from './config/load.js';

export { ContentIndex, computeFileHash, isIndexable, type IndexEntry, type IndexStats } from './index/content-index.js';

export {
  verifyParse,
  verifyAstEquivalence,
  verifyCstRoundtrip,
  guardEdit,
  guardFileEdit,
  guardFor,
  formatGuardError,
  getGuardSummary,
  type GuardFn,
  type GuardSummary
} from './guard/verifier.js';
export { isGuardedFile, GUARDED_EXTENSIONS, syntaxBackendFor, type SyntaxBackend } from './guard/syntax.js';

export { applyEdits, sortEdits } from './repair/apply-edits.js';
export { tryApplyWithRepair, type TryApplyResult } from './repair/engine.js';
export { writeRepairReport, readLatestRepairReport } from './repair/report.js';

export { Journal } from './journal/journal.js';
export {
  readJournal,
  buildRevertPlan,
  findLatestJournal,
  getJournalIdFromPath,
  executeRevertPlan,
  type RevertOptions,
  type RevertOutcome
} from './journal/revert.js';
export type { JournalEntry, IntentEntry, SuccessEntry, RevertEntry, RevertContext } from './journal/types.js';

export {
  createReceipt,
  verifyReceipt,
  verifyReceipts,
  isIdempotentTransformation,
  receiptId,
  parseReceipt
} from './receipt/receipts.js';

export { rstar, decision, computePlanRstar, enforcePolicy, type PolicyDecision, type PolicyContext } from './policy/engine.js';
export { isSuppressed, getMode, policyHash } from './policy/config.js';
export {
  applyBudget,
  countLinesInPlan,
  formatBudgetSummary,
  formatExcludedSummary,
  type BudgetConstraints,
  type BudgetResult,
  type BudgetSummary
} from './policy/budget.js';

export {
  LearningEngine,
  contextKey,
  getRuleIdsFromPlan,
  type Outcome,
  type RuleStats,
  type ContextStats,
  type LearningData,
  type TunedThresholds
} from './learning/engine.js';

export { runAnalysis, type Analyzer, type AnalysisOptions, type AnalysisResult } from './pipeline/analyze.js';
export { CommitPipeline, type CommitPipelineOptions, type CommitResult, type FileCommitResult } from './pipeline/commit.js';
export { KeyedMutex } from './pipeline/keyed-mutex.js';

export { checkGitSafety, isGitRepo, isGitTreeClean, getGitStatus, type GitStatus } from './repo/git-safety.js';
export { atomicWrite, atomicWriteSync } from './store/atomic-write.js';
export { makeRunId } from './store/run-id.js';
export { getAceRoot, getJournalsDir, getLearnPath, getIndexPath, getRepairsDir } from './store/ace-root.js';
