/**
 * Orchestrator Type Definitions
 *
 * Core types for the turn engine: capabilities, message records, the
 * specialist handler contract, handoff decisions and turn results.
 */

// ============================================================================
// Capability Types
// ============================================================================

/**
 * A registered handler and what it is for.
 * Everything except `available` is fixed at registration.
 */
export interface Capability {
  /** Unique handler name (e.g., "sales") */
  readonly name: string;

  /** Specialization tag (e.g., "billing_and_sales") */
  readonly specialization: string;

  /** Skill tags; matched against customer text by the handoff triggers */
  readonly skills: readonly string[];

  /** Intent labels the router sends to this handler */
  readonly intents: readonly string[];

  /** Human-readable description for prompts and the agents endpoint */
  readonly description: string;

  /** Whether the handler can be dispatched right now */
  available: boolean;
}

// ============================================================================
// Conversation Types
// ============================================================================

export type Sender = 'user' | 'agent' | 'system';

/**
 * One entry of a conversation, in chronological order.
 */
export interface MessageRecord {
  id: string;
  sender: Sender;
  text: string;

  /** Attributed handler; set only when sender is 'agent' */
  handler?: string;

  /** Unix timestamp (milliseconds) */
  timestamp: number;

  metadata: Record<string, unknown>;
}

/**
 * Irreversibly compacted history. At most one per conversation,
 * always logically before the retained window.
 */
export interface SummaryRecord {
  text: string;
  coveredCount: number;
  createdAt: number;
}

/**
 * Retained window plus the active summary.
 */
export interface ConversationContext {
  summary: SummaryRecord | null;
  messages: MessageRecord[];
}

// ============================================================================
// Handler Contract
// ============================================================================

export type HandoffDecision =
  | { type: 'stay' }
  | { type: 'handoff'; target: string; reason: string };

export interface HandlerInput {
  dialogId: string;
  userText: string;
  context: ConversationContext;

  /** Present when the conversation was handed to this handler during the current turn */
  handoff?: { from: string; reason: string };

  signal?: AbortSignal;
}

export interface HandlerOutput {
  response: string;
  decision: HandoffDecision;
  metadata: Record<string, unknown>;
}

/**
 * A specialist handler. Implementations must not write to persistence.
 */
export interface SpecialistHandler {
  readonly name: string;
  handle(input: HandlerInput): Promise<HandlerOutput>;
}

// ============================================================================
// Routing Types
// ============================================================================

export type RoutingFallback = 'low_confidence' | 'tie' | 'target_unavailable' | 'unknown_intent';

export interface RoutingDecision {
  target: string;
  intent: string;
  confidence: number;

  /** Why the default handler was chosen instead of the classified one */
  fallback?: RoutingFallback;
}

// ============================================================================
// Turn Types
// ============================================================================

/**
 * Turn state machine:
 * unresolved → routed → dispatched → handoff_pending → resolved | failed
 */
export type TurnState =
  | 'unresolved'
  | 'routed'
  | 'dispatched'
  | 'handoff_pending'
  | 'resolved'
  | 'failed';

export interface TurnResult {
  readonly response: string;
  readonly currentHandler: string;
  readonly previousHandler: string | null;
  readonly handoffReason: string | null;
  readonly intent: string | null;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Handoff reasons the orchestrator assigns itself.
 */
export const ORCHESTRATION_REASONS = {
  initialRouting: 'initial_routing',
  handlerUnavailable: 'handler_unavailable',
  targetUnavailable: 'handoff_target_unavailable',
  routingLoop: 'routing_loop',
} as const;
