import { buildPromotionPolicy, computePolicyFingerprint } from '../../../services/evaluation/PromotionPolicy';

describe('PromotionPolicy', () => {
  it('normalizes thresholds and keeps the baseline rule', () => {
    expect(buildPromotionPolicy({ auc: 0.8 }, { primary_metric: 'auc', tolerance: 0.01 })).toEqual({
      thresholds: [{ metric: 'auc', direction: 'min', bound: 0.8 }],
      baseline: { primary_metric: 'auc', tolerance: 0.01 },
    });
    expect(buildPromotionPolicy({})).toEqual({ thresholds: [] });
  });

  describe('computePolicyFingerprint', () => {
    it('is a 16 character hex string', () => {
      expect(computePolicyFingerprint(buildPromotionPolicy({ auc: 0.8 }))).toMatch(/^[0-9a-f]{16}$/);
    });

    it('ignores threshold declaration order', () => {
      const a = computePolicyFingerprint(buildPromotionPolicy({ auc: 0.8, accuracy: 0.85 }));
      const b = computePolicyFingerprint(buildPromotionPolicy({ accuracy: 0.85, auc: 0.8 }));
      expect(a).toBe(b);
    });

    it('changes with any threshold bound or direction', () => {
      const base = computePolicyFingerprint(buildPromotionPolicy({ auc: 0.8 }));
      expect(computePolicyFingerprint(buildPromotionPolicy({ auc: 0.81 }))).not.toBe(base);
      expect(computePolicyFingerprint(buildPromotionPolicy({ auc: { max: 0.8 } }))).not.toBe(base);
    });

    it('changes with the baseline rule', () => {
      const without = computePolicyFingerprint(buildPromotionPolicy({ auc: 0.8 }));
      const withBaseline = computePolicyFingerprint(
        buildPromotionPolicy({ auc: 0.8 }, { primary_metric: 'auc', tolerance: 0 })
      );
      const looser = computePolicyFingerprint(
        buildPromotionPolicy({ auc: 0.8 }, { primary_metric: 'auc', tolerance: 0.05 })
      );
      expect(withBaseline).not.toBe(without);
      expect(looser).not.toBe(withBaseline);
    });
  });
});
