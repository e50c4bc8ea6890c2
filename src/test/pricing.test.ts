import * as assert from 'assert';
import { estimateCost, estimateOutputTokens, MODEL_PRICING, pricingFor, resolveModelKey } from '../audit/pricing.js';

function assertClose(actual: number, expected: number) {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${actual} to be close to ${expected}`);
}

const sonnet = MODEL_PRICING['claude-sonnet-4-5'];
const opus = MODEL_PRICING['claude-opus-4-6'];

suite('Pricing', () => {
  test('nothing costs nothing', () => {
    for (const pricing of Object.values(MODEL_PRICING)) {
      assert.strictEqual(estimateCost({ inputTokens: 0, outputTokens: 0 }, pricing), 0);
    }
  });

  test('standard rates below the tier', () => {
    assertClose(estimateCost({ inputTokens: 100_000, outputTokens: 10_000 }, sonnet, false), 0.45);
  });

  test('batch discount applies to the whole total', () => {
    assertClose(estimateCost({ inputTokens: 100_000, outputTokens: 10_000 }, sonnet, true), 0.225);
    const gemini = MODEL_PRICING['gemini-2.5-flash'];
    assert.strictEqual(
      estimateCost({ inputTokens: 100_000, outputTokens: 10_000 }, gemini, true),
      estimateCost({ inputTokens: 100_000, outputTokens: 10_000 }, gemini, false)
    );
  });

  test('only excess input is billed at the high tier, all output moves up', () => {
    assertClose(estimateCost({ inputTokens: 1_000_000, outputTokens: 0 }, sonnet, false), 5.4);
    assertClose(estimateCost({ inputTokens: 300_000, outputTokens: 1_000_000 }, sonnet, false), 23.7);
  });

  test('cache tokens use their own rates', () => {
    assertClose(estimateCost({ inputTokens: 0, outputTokens: 0, cacheReadTokens: 1_000_000, cacheWriteTokens: 1_000_000 }, opus, false), 6.75);
    assertClose(estimateCost({ inputTokens: 0, outputTokens: 0, cacheReadTokens: 1_000_000, cacheWriteTokens: 1_000_000 }, opus, true), 3.375);
  });

  test('cost never decreases as input grows', () => {
    for (const pricing of Object.values(MODEL_PRICING)) {
      let previous = 0;
      for (let input = 0; input <= 1_000_000; input += 25_000) {
        const cost = estimateCost({ inputTokens: input, outputTokens: 5_000 }, pricing);
        assert.ok(cost >= previous);
        previous = cost;
      }
    }
  });

  test('models resolve to a price-table key by family', () => {
    assert.strictEqual(resolveModelKey('anthropic', 'claude-sonnet-4-5'), 'claude-sonnet-4-5');
    assert.strictEqual(resolveModelKey('anthropic', 'claude-opus-4-20250514'), 'claude-opus-4-6');
    assert.strictEqual(resolveModelKey('openai', 'gpt-4o-mini'), 'gpt-4.1-mini');
    assert.strictEqual(resolveModelKey('gemini', 'gemini-2.5-pro'), 'gemini-2.5-flash');
    assert.strictEqual(resolveModelKey('other', 'mystery'), 'gemini-2.0-flash');
    assert.strictEqual(pricingFor('openai', 'gpt-4.1').pricing, MODEL_PRICING['gpt-4.1']);
  });

  test('output estimate is a tenth of input, capped per focus', () => {
    assert.strictEqual(estimateOutputTokens(50_000), 5_000);
    assert.strictEqual(estimateOutputTokens(1_000_000, 2), 32_768);
    assert.strictEqual(estimateOutputTokens(10_000, 0), 1_000);
  });
});
