/**
 * GameEvents.ts - Type definitions for all legality and engagement events.
 *
 * Events are notifications only. They are processed immediately (synchronously)
 * on the single server thread, and no consumer may derive an authoritative
 * decision from them; they must ask the owning service instead.
 *
 * Event categories:
 * - Actor Events: spawned, despawned, entered a region
 * - Targeting Events: selection changed, intent denied
 * - Combat Events: state changed, auto-attack scheduled, cancelled, resolved
 * - Region Events: rule snapshot registered, travel denied
 */

import type { ActionKind } from "../../protocol/enums/ActionKind";
import type { ActorType } from "../../protocol/enums/ActorType";
import type { CombatState } from "../../protocol/enums/CombatState";
import type { DenyReason } from "../../protocol/enums/DenyReason";
import type { SceneContext } from "../../protocol/enums/SceneRules";
import type { TravelDenyReason } from "../../protocol/enums/TravelDenyReason";

// ============================================================================
// Base Event Types
// ============================================================================

/**
 * Base interface for all game events.
 */
export interface GameEventBase {
  type: string;
  timestamp: number;
}

/**
 * What the client was trying to do when an intent was refused.
 */
export type IntentKind = "Select" | "Attack";

export type AttackOutcomeKind = "Hit" | "Miss";

// ============================================================================
// Actor Events
// ============================================================================

export interface ActorSpawnedEvent extends GameEventBase {
  type: "ActorSpawned";
  actorId: number;
  actorType: ActorType;
  regionId: string;
}

export interface ActorDespawnedEvent extends GameEventBase {
  type: "ActorDespawned";
  actorId: number;
  regionId: string;
}

export interface RegionEnteredEvent extends GameEventBase {
  type: "RegionEntered";
  actorId: number;
  regionId: string;
  /** Null when the region has no valid rule snapshot. */
  context: SceneContext | null;
}

// ============================================================================
// Targeting Events
// ============================================================================

export interface SelectionChangedEvent extends GameEventBase {
  type: "SelectionChanged";
  actorId: number;
  previousTargetId: number | null;
  targetId: number | null;
  /** True when the selection was made by an attack intent rather than a passive select. */
  attackDriven: boolean;
}

export interface TargetIntentDeniedEvent extends GameEventBase {
  type: "TargetIntentDenied";
  actorId: number;
  targetId: number;
  intent: IntentKind;
  reason: DenyReason;
}

// ============================================================================
// Combat Events
// ============================================================================

export interface CombatStateChangedEvent extends GameEventBase {
  type: "CombatStateChanged";
  actorId: number;
  oldState: CombatState;
  newState: CombatState;
}

export interface AttackScheduledEvent extends GameEventBase {
  type: "AttackScheduled";
  attackerId: number;
  targetId: number;
  actionKind: ActionKind;
}

export interface AttackCancelledEvent extends GameEventBase {
  type: "AttackCancelled";
  attackerId: number;
  targetId: number;
}

export interface AttackResolvedEvent extends GameEventBase {
  type: "AttackResolved";
  attackerId: number;
  targetId: number;
  actionKind: ActionKind;
  outcome: AttackOutcomeKind;
}

// ============================================================================
// Region Events
// ============================================================================

export interface RegionRulesRegisteredEvent extends GameEventBase {
  type: "RegionRulesRegistered";
  regionId: string;
  isValid: boolean;
}

export interface TravelDeniedEvent extends GameEventBase {
  type: "TravelDenied";
  actorId: number;
  portalId: string;
  reason: TravelDenyReason;
}

// ============================================================================
// Union Types
// ============================================================================

export type ActorEvent = ActorSpawnedEvent | ActorDespawnedEvent | RegionEnteredEvent;

export type TargetingEvent = SelectionChangedEvent | TargetIntentDeniedEvent;

export type CombatEvent =
  | CombatStateChangedEvent
  | AttackScheduledEvent
  | AttackCancelledEvent
  | AttackResolvedEvent;

export type RegionEvent = RegionRulesRegisteredEvent | TravelDeniedEvent;

export type GameEvent = ActorEvent | TargetingEvent | CombatEvent | RegionEvent;

export type GameEventType = GameEvent["type"];

export type GameEventOf<T extends GameEventType> = Extract<GameEvent, { type: T }>;

// ============================================================================
// Event Factory Functions
// ============================================================================

function createTimestamp(): number {
  return Date.now();
}

export function createActorSpawnedEvent(actorId: number, actorType: ActorType, regionId: string): ActorSpawnedEvent {
  return { type: "ActorSpawned", timestamp: createTimestamp(), actorId, actorType, regionId };
}

export function createActorDespawnedEvent(actorId: number, regionId: string): ActorDespawnedEvent {
  return { type: "ActorDespawned", timestamp: createTimestamp(), actorId, regionId };
}

export function createRegionEnteredEvent(
  actorId: number,
  regionId: string,
  context: SceneContext | null
): RegionEnteredEvent {
  return { type: "RegionEntered", timestamp: createTimestamp(), actorId, regionId, context };
}

export function createSelectionChangedEvent(
  actorId: number,
  previousTargetId: number | null,
  targetId: number | null,
  attackDriven: boolean
): SelectionChangedEvent {
  return {
    type: "SelectionChanged",
    timestamp: createTimestamp(),
    actorId,
    previousTargetId,
    targetId,
    attackDriven
  };
}

export function createTargetIntentDeniedEvent(
  actorId: number,
  targetId: number,
  intent: IntentKind,
  reason: DenyReason
): TargetIntentDeniedEvent {
  return { type: "TargetIntentDenied", timestamp: createTimestamp(), actorId, targetId, intent, reason };
}

export function createCombatStateChangedEvent(
  actorId: number,
  oldState: CombatState,
  newState: CombatState
): CombatStateChangedEvent {
  return { type: "CombatStateChanged", timestamp: createTimestamp(), actorId, oldState, newState };
}

export function createAttackScheduledEvent(
  attackerId: number,
  targetId: number,
  actionKind: ActionKind
): AttackScheduledEvent {
  return { type: "AttackScheduled", timestamp: createTimestamp(), attackerId, targetId, actionKind };
}

export function createAttackCancelledEvent(attackerId: number, targetId: number): AttackCancelledEvent {
  return { type: "AttackCancelled", timestamp: createTimestamp(), attackerId, targetId };
}

export function createAttackResolvedEvent(
  attackerId: number,
  targetId: number,
  actionKind: ActionKind,
  outcome: AttackOutcomeKind
): AttackResolvedEvent {
  return { type: "AttackResolved", timestamp: createTimestamp(), attackerId, targetId, actionKind, outcome };
}

export function createRegionRulesRegisteredEvent(regionId: string, isValid: boolean): RegionRulesRegisteredEvent {
  return { type: "RegionRulesRegistered", timestamp: createTimestamp(), regionId, isValid };
}

export function createTravelDeniedEvent(
  actorId: number,
  portalId: string,
  reason: TravelDenyReason
): TravelDeniedEvent {
  return { type: "TravelDenied", timestamp: createTimestamp(), actorId, portalId, reason };
}
