import { estimateCostUsd, lookupModelPricing, PricingTable } from '../../src/sessions/pricing';

describe('pricing', () => {
  describe('lookupModelPricing', () => {
    it('should prefer the longest matching prefix', () => {
      expect(lookupModelPricing('gemini-2.5-flash-lite-preview')).toEqual({
        inputPerToken: 0.10 / 1_000_000,
        outputPerToken: 0.40 / 1_000_000
      });
      expect(lookupModelPricing('gemini-2.5-flash-001')).toEqual({
        inputPerToken: 0.30 / 1_000_000,
        outputPerToken: 2.50 / 1_000_000
      });
    });

    it('should ignore case', () => {
      expect(lookupModelPricing('GPT-4o-mini')).toBe(lookupModelPricing('gpt-4o-mini'));
    });

    it('should return undefined for unknown models', () => {
      expect(lookupModelPricing('llama-3-70b')).toBeUndefined();
    });
  });

  describe('estimateCostUsd', () => {
    it('should price prompt and completion tokens separately', () => {
      // 1M * 1.25 + 1M * 10
      expect(estimateCostUsd({ model: 'gemini-2.5-pro', promptTokens: 1_000_000, completionTokens: 1_000_000 })).toBe(11.25);
    });

    it('should round to six decimals', () => {
      // 7 * 0.15e-6 + 3 * 0.6e-6 = 2.85e-6
      expect(estimateCostUsd({ model: 'gpt-4o-mini', promptTokens: 7, completionTokens: 3 })).toBe(0.000003);
    });

    it('should return zero for unknown or missing models', () => {
      expect(estimateCostUsd({ model: 'llama-3-70b', promptTokens: 100, completionTokens: 100 })).toBe(0);
      expect(estimateCostUsd({ promptTokens: 100, completionTokens: 100 })).toBe(0);
    });

    it('should use a custom table', () => {
      const table: PricingTable = [['house-model', { inputPerToken: 0.001, outputPerToken: 0.002 }]];

      expect(estimateCostUsd({ model: 'house-model-v2', promptTokens: 10, completionTokens: 5 }, table)).toBe(0.02);
    });
  });
});
