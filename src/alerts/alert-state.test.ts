/**
 * Alert state machine tests
 */

import { AlertSeverity, AlertType, ComparisonDirection, ThresholdConfig } from '../types/alerts';
import { createAlertState, evaluateAlertState, exceededSeconds, isBreached } from './alert-state';
import { createThresholdConfig } from './threshold-registry';

const SECOND = 1000;
const T0 = 1_700_000_000_000;

function threshold(overrides: Partial<ThresholdConfig> = {}): ThresholdConfig {
  return createThresholdConfig({
    name: 'cpu_usage_high',
    metric: 'cpu_usage',
    threshold: 80,
    duration_seconds: 60,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.CPU_USAGE_HIGH,
    alert_message: 'CPU above {threshold}%',
    cooldown_seconds: 600,
    ...overrides
  });
}

describe('alert state', () => {
  describe('isBreached', () => {
    it('should treat the threshold itself as a breach for ABOVE', () => {
      const config = threshold();
      expect(isBreached(config, 80)).toBe(true);
      expect(isBreached(config, 79.9)).toBe(false);
    });

    it('should breach at or below the threshold for BELOW', () => {
      const config = threshold({ threshold: -75, direction: ComparisonDirection.BELOW });
      expect(isBreached(config, -75)).toBe(true);
      expect(isBreached(config, -80)).toBe(true);
      expect(isBreached(config, -60)).toBe(false);
    });
  });

  describe('duration gating', () => {
    it('should not alert before the breach has lasted duration_seconds', () => {
      const state = createAlertState(threshold());

      expect(evaluateAlertState(state, 85, T0)).toBe('pending');
      expect(evaluateAlertState(state, 86, T0 + 30 * SECOND)).toBe('pending');
      expect(evaluateAlertState(state, 87, T0 + 59 * SECOND)).toBe('pending');
      expect(state.is_active).toBe(false);
      expect(state.exceeded_since).toBe(T0);
    });

    it('should alert once the breach has lasted exactly duration_seconds', () => {
      const state = createAlertState(threshold());

      evaluateAlertState(state, 85, T0);
      expect(evaluateAlertState(state, 90, T0 + 60 * SECOND)).toBe('alert');
      expect(state.is_active).toBe(true);
      expect(state.last_alert_time).toBe(T0 + 60 * SECOND);
      expect(state.current_value).toBe(90);
    });

    it('should restart the duration after a dip below the threshold', () => {
      const state = createAlertState(threshold());

      evaluateAlertState(state, 85, T0);
      expect(evaluateAlertState(state, 50, T0 + 40 * SECOND)).toBe('clear');
      expect(state.exceeded_since).toBeNull();
      expect(evaluateAlertState(state, 85, T0 + 50 * SECOND)).toBe('pending');
      expect(evaluateAlertState(state, 85, T0 + 100 * SECOND)).toBe('pending');
      expect(evaluateAlertState(state, 85, T0 + 110 * SECOND)).toBe('alert');
    });

    it('should alert on the first sample when duration_seconds is 0', () => {
      const state = createAlertState(threshold({ duration_seconds: 0 }));
      expect(evaluateAlertState(state, 95, T0)).toBe('alert');
    });
  });

  describe('one alert per episode', () => {
    it('should stay silent while the breach continues past the cooldown', () => {
      const state = createAlertState(threshold());

      evaluateAlertState(state, 85, T0);
      expect(evaluateAlertState(state, 85, T0 + 60 * SECOND)).toBe('alert');
      expect(evaluateAlertState(state, 85, T0 + 120 * SECOND)).toBe('active');
      expect(evaluateAlertState(state, 85, T0 + 3600 * SECOND)).toBe('active');
    });
  });

  describe('cooldown', () => {
    it('should suppress a second episode that completes inside the cooldown', () => {
      const state = createAlertState(threshold());

      evaluateAlertState(state, 85, T0);
      evaluateAlertState(state, 85, T0 + 60 * SECOND);
      expect(evaluateAlertState(state, 40, T0 + 70 * SECOND)).toBe('recovered');

      evaluateAlertState(state, 85, T0 + 80 * SECOND);
      expect(evaluateAlertState(state, 85, T0 + 140 * SECOND)).toBe('cooldown');
      expect(state.is_active).toBe(false);
    });

    it('should alert again once the cooldown since the last alert has passed', () => {
      const state = createAlertState(threshold());

      evaluateAlertState(state, 85, T0);
      evaluateAlertState(state, 85, T0 + 60 * SECOND);
      evaluateAlertState(state, 40, T0 + 70 * SECOND);
      evaluateAlertState(state, 85, T0 + 80 * SECOND);

      expect(evaluateAlertState(state, 85, T0 + 659 * SECOND)).toBe('cooldown');
      expect(evaluateAlertState(state, 85, T0 + 660 * SECOND)).toBe('alert');
      expect(state.last_alert_time).toBe(T0 + 660 * SECOND);
    });

    it('should not apply a cooldown to the very first alert', () => {
      const state = createAlertState(threshold({ duration_seconds: 0, cooldown_seconds: 600 }));
      expect(evaluateAlertState(state, 99, 1000)).toBe('alert');
    });
  });

  describe('recovery', () => {
    it('should recover immediately when the value drops below the threshold', () => {
      const state = createAlertState(threshold());

      evaluateAlertState(state, 85, T0);
      evaluateAlertState(state, 85, T0 + 60 * SECOND);
      expect(evaluateAlertState(state, 79, T0 + 61 * SECOND)).toBe('recovered');
      expect(state.is_active).toBe(false);
      expect(state.exceeded_since).toBeNull();
      expect(state.last_alert_time).toBe(T0 + 60 * SECOND);
    });

    it('should report clear for values below the threshold on an idle state', () => {
      const state = createAlertState(threshold());
      expect(evaluateAlertState(state, 10, T0)).toBe('clear');
    });
  });

  describe('exceededSeconds', () => {
    it('should measure the current episode in seconds', () => {
      const state = createAlertState(threshold());
      expect(exceededSeconds(state, T0)).toBe(0);

      evaluateAlertState(state, 85, T0);
      expect(exceededSeconds(state, T0 + 125 * SECOND)).toBe(125);
    });
  });
});
