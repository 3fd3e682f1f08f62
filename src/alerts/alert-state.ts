/**
 * Duration-gated, cooldown-gated threshold state machine.
 *
 * One alert is raised per breach episode: once a state is active it stays
 * silent until the value recovers, however long the breach lasts. Recovery
 * is immediate, with no duration gate.
 */

import { AlertState, ComparisonDirection, EntityContext, ThresholdConfig } from '../types/alerts';

export type EvaluationOutcome =
  /** Duration and cooldown both satisfied: the caller must raise an alert */
  | 'alert'
  /** Breached and already alerted for this episode */
  | 'active'
  /** Breached, duration not yet met */
  | 'pending'
  /** Breached for long enough, but the last alert is too recent */
  | 'cooldown'
  /** Was active and is no longer breached */
  | 'recovered'
  | 'clear';

export function createAlertState(config: ThresholdConfig, entity: EntityContext | null = null): AlertState {
  return {
    config,
    entity,
    exceeded_since: null,
    last_alert_time: 0,
    current_value: 0,
    is_active: false
  };
}

export function isBreached(config: ThresholdConfig, value: number): boolean {
  return config.direction === ComparisonDirection.BELOW
    ? value <= config.threshold
    : value >= config.threshold;
}

/**
 * Feed one observation into the state. `now` is epoch milliseconds.
 * On 'alert' the state is already marked active with `last_alert_time = now`.
 */
export function evaluateAlertState(state: AlertState, value: number, now: number): EvaluationOutcome {
  const config = state.config;
  state.current_value = value;

  if (!isBreached(config, value)) {
    const wasActive = state.is_active;
    state.exceeded_since = null;
    state.is_active = false;
    return wasActive ? 'recovered' : 'clear';
  }

  if (state.exceeded_since === null) {
    state.exceeded_since = now;
  }

  if (state.is_active) {
    return 'active';
  }

  const exceededMs = now - state.exceeded_since;
  if (exceededMs < config.duration_seconds * 1000) {
    return 'pending';
  }

  // last_alert_time 0 means no alert has been raised yet
  if (state.last_alert_time > 0 && now - state.last_alert_time < config.cooldown_seconds * 1000) {
    return 'cooldown';
  }

  state.last_alert_time = now;
  state.is_active = true;
  return 'alert';
}

/**
 * Seconds the current breach episode has lasted, or 0 when not breached
 */
export function exceededSeconds(state: AlertState, now: number): number {
  return state.exceeded_since === null ? 0 : Math.max(0, (now - state.exceeded_since) / 1000);
}
