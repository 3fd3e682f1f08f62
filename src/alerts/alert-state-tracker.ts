/**
 * Per (threshold name, entity) alert state tracking
 */

import { AlertState, EntityContext, EntityScope, ThresholdConfig } from '../types/alerts';
import { createAlertState } from './alert-state';

export class AlertStateTracker {
  private states: Map<string, AlertState> = new Map();

  static stateKey(thresholdName: string, entity: EntityContext | null): string {
    return entity ? `${thresholdName}@${entity.scope}:${entity.key}` : thresholdName;
  }

  /**
   * Key used by the active-alert query: the threshold name for global
   * thresholds, `<scope>_<entity>_<name>` for scoped ones
   */
  static alertKey(thresholdName: string, entity: EntityContext | null): string {
    return entity ? `${entity.scope}_${entity.key}_${thresholdName}` : thresholdName;
  }

  /**
   * Get the state for a threshold and entity, creating a fresh one on first sight.
   * The entity context is refreshed so the latest process or interface name is kept.
   */
  getOrCreate(config: ThresholdConfig, entity: EntityContext | null): AlertState {
    const key = AlertStateTracker.stateKey(config.name, entity);
    let state = this.states.get(key);

    if (!state) {
      state = createAlertState(config, entity);
      this.states.set(key, state);
    } else if (entity) {
      state.entity = entity;
    }

    return state;
  }

  getState(thresholdName: string, entity: EntityContext | null = null): AlertState | undefined {
    return this.states.get(AlertStateTracker.stateKey(thresholdName, entity));
  }

  /**
   * Replace every state of a threshold (all entities) with a fresh state bound to `config`
   */
  resetThreshold(config: ThresholdConfig): number {
    let resetCount = 0;
    for (const [key, state] of this.states) {
      if (state.config.name === config.name) {
        this.states.set(key, createAlertState(config, state.entity));
        resetCount++;
      }
    }
    return resetCount;
  }

  /**
   * Drop the states of entities of `scope` that are missing from `seenKeys`.
   * An entity is kept while any of its states is active.
   */
  pruneEntities(scope: EntityScope, seenKeys: ReadonlySet<string>): string[] {
    const byEntity = new Map<string, string[]>();
    const activeEntities = new Set<string>();

    for (const [stateKey, state] of this.states) {
      if (!state.entity || state.entity.scope !== scope || seenKeys.has(state.entity.key)) {
        continue;
      }
      const entityKey = state.entity.key;
      const keys = byEntity.get(entityKey) ?? [];
      keys.push(stateKey);
      byEntity.set(entityKey, keys);
      if (state.is_active) {
        activeEntities.add(entityKey);
      }
    }

    const removed: string[] = [];
    for (const [entityKey, stateKeys] of byEntity) {
      if (activeEntities.has(entityKey)) {
        continue;
      }
      for (const stateKey of stateKeys) {
        this.states.delete(stateKey);
      }
      removed.push(entityKey);
    }

    return removed;
  }

  getStates(): AlertState[] {
    return Array.from(this.states.values());
  }

  getActiveStates(): AlertState[] {
    return this.getStates().filter(state => state.is_active);
  }

  get size(): number {
    return this.states.size;
  }
}
