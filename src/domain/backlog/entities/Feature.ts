/**
 * Backlog domain entities
 * These types represent the core domain objects the scheduler works over
 */

/**
 * Lifecycle status of a Feature. `completed` is terminal.
 */
export type FeatureStatus = 'pending' | 'in-progress' | 'completed';

/**
 * Classification tag for a Feature (informational only)
 */
export type FeatureCategory =
  | 'functional'
  | 'bugfix'
  | 'refactor'
  | 'testing'
  | 'documentation'
  | 'infrastructure';

/**
 * Optional validation policy attached to a Feature or used as harness default.
 * Every field is independently optional; absence means "not enforced".
 */
export interface QualityGates {
  requireTests: boolean;
  maxFileLines?: number;
  securityChecklist: string[];
  lintCommand?: string;
  typeCheckCommand?: string;
  customValidators: string[];
}

/**
 * A single unit of backlog work
 */
export interface Feature {
  id: string;
  name: string;
  description: string;
  category: FeatureCategory;
  status: FeatureStatus;
  priority: number; // Higher = more urgent
  dependsOn: string[]; // IDs of Features that must be completed first
  acceptanceCriteria: string[];
  qualityGates?: QualityGates; // Absent = use harness default
  startedAt?: string; // ISO date string
  completedAt?: string; // ISO date string
  sessionsSpent: number;
  implementationNotes: string[];
}

/**
 * Aggregate root. Features keep insertion order; priority order is computed.
 */
export interface Backlog {
  projectName: string;
  projectPath: string;
  features: Feature[];
  createdAt: string;
  lastUpdated: string;
}

/**
 * One record in the progress ledger
 */
export interface ProgressEntry {
  sessionId: string;
  featureId?: string;
  action: string; // e.g. "session_started", "feature_completed", "handoff"
  summary: string;
  filesChanged?: string[];
  commitHash?: string;
  timestamp?: Date; // Defaults to the time of appending
}

/**
 * A dependency id that does not resolve inside its Backlog
 */
export interface DanglingDependency {
  featureId: string;
  missingId: string;
  reason: 'missing' | 'selfDependency';
}

/**
 * Counts by status, plus pending Features whose dependencies are unmet
 */
export interface BacklogSummary {
  projectName: string;
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  blocked: number;
  eligible: number;
  complete: boolean;
}
