/**
 * Barrel export for all shared types.
 */
export {
    EntityType,
    RelationType,
    Modality,
    LINK_AUTHORITIES,
    RELATION_SCHEMA,
    isEntityType,
    isRelationType,
    isModality,
    isLinkAuthority,
} from './schema.js';
export type { LinkAuthority, ArgumentKind, RoleSpec } from './schema.js';
export type {
    Span,
    LinkingIdentifier,
    Entity,
    CoreferenceChain,
    ArgumentRef,
    RelationArgument,
    Relation,
    Document,
} from './document.js';
export type {
    EntityPair,
    RelationPair,
    Cluster,
    ClusterLink,
    CoreferenceAlignment,
    ModalityMismatch,
    DocumentAlignment,
} from './alignment.js';
export type {
    Counts,
    CoreferenceCounts,
    LinkingCounts,
    ScoreRecord,
    DocumentScore,
    PrfScore,
    MacroScore,
    CategoryReport,
    CoreferenceReport,
    LinkingReport,
    ExcludedDocument,
    DocumentReportRow,
    CorpusScoreReport,
    RepeatSummary,
} from './score.js';
export { DEFAULT_CONFIG, DEFAULT_EVALUATION_CONFIG } from './config.js';
export type {
    PhytoEvalConfig,
    EvaluationConfig,
    MatchingStrategy,
    PredictionErrorPolicy,
    ReportFormat,
    LogLevel,
    RunRecord,
    DocumentScoreRow,
} from './config.js';
