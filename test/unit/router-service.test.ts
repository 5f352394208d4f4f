import { describe, it, expect } from 'vitest';
import { ROUTING_TOOL_NAME, RouterService } from '../../src/services/RouterService';
import { ProtocolViolation } from '../../src/utils/errors';
import { ScriptedAIProvider, text, toolCall } from './mocks';

const ALL_RESPONDERS = ['product_details', 'reviews', 'orders'] as const;

describe('RouterService', () => {
  it('should return the routing decision from the forced tool call', async () => {
    const ai = new ScriptedAIProvider(
      toolCall(ROUTING_TOOL_NAME, { responder: 'orders', confidence: 0.92, reasoning: 'Purchase intent' })
    );
    const router = new RouterService(ai, { enabled: ALL_RESPONDERS, temperature: 0.1 });

    const decision = await router.route('I want to buy the Eco Green', []);

    expect(decision).toEqual({ responder: 'orders', confidence: 0.92, rationale: 'Purchase intent' });

    const [request] = ai.requests;
    expect(request.toolChoice).toBe('required');
    expect(request.temperature).toBe(0.1);
    expect(request.tools).toHaveLength(1);
    expect(request.tools?.[0].name).toBe(ROUTING_TOOL_NAME);
    expect(request.tools?.[0].parameters).toMatchObject({
      properties: { responder: { enum: ['product_details', 'reviews', 'orders'] } },
      required: ['responder', 'confidence', 'reasoning'],
    });
  });

  it('should place the supplied history between the prompt and the message', async () => {
    const ai = new ScriptedAIProvider(
      toolCall(ROUTING_TOOL_NAME, { responder: 'orders', confidence: 0.8, reasoning: 'Order in progress' })
    );
    const router = new RouterService(ai, { enabled: ALL_RESPONDERS, temperature: 0.1 });

    await router.route('Queen please', [
      { role: 'user', content: 'I want the Eco Green' },
      { role: 'assistant', content: 'Which size?' },
    ]);

    expect(ai.requests[0].messages.slice(1)).toEqual([
      { role: 'user', content: 'I want the Eco Green' },
      { role: 'assistant', content: 'Which size?' },
      { role: 'user', content: 'Queen please' },
    ]);
  });

  it('should describe each enabled responder in the prompt', async () => {
    const ai = new ScriptedAIProvider(
      toolCall(ROUTING_TOOL_NAME, { responder: 'reviews', confidence: 0.7, reasoning: 'Feedback' })
    );
    const router = new RouterService(ai, { enabled: ['product_details', 'reviews'], temperature: 0.1 });

    await router.route('What do customers say?', []);

    const prompt = ai.requests[0].messages[0].content ?? '';
    expect(prompt).toContain('Product Details Agent (id: product_details)');
    expect(prompt).toContain('KEYWORDS: reviews, ratings, feedback');
    expect(prompt).not.toContain('Orders Agent');
    expect(router.enabledResponders).toEqual(['product_details', 'reviews']);
  });

  it('should reject a responder that is not enabled', async () => {
    const ai = new ScriptedAIProvider(
      toolCall(ROUTING_TOOL_NAME, { responder: 'orders', confidence: 0.9, reasoning: 'Buy' })
    );
    const router = new RouterService(ai, { enabled: ['product_details', 'reviews'], temperature: 0.1 });

    await expect(router.route('Buy it', [])).rejects.toMatchObject({
      code: 'MALFORMED_TOOL_ARGUMENTS',
    });
  });

  it('should treat a free-text answer as a protocol violation', async () => {
    const ai = new ScriptedAIProvider(text('Sure, I can help with that!'));
    const router = new RouterService(ai, { enabled: ALL_RESPONDERS, temperature: 0.1 });

    const attempt = router.route('Hello', []);

    await expect(attempt).rejects.toBeInstanceOf(ProtocolViolation);
    await expect(attempt).rejects.toMatchObject({ code: 'MISSING_TOOL_CALL' });
  });

  it('should reject unparseable or out-of-range arguments', async () => {
    const ai = new ScriptedAIProvider(
      toolCall(ROUTING_TOOL_NAME, '{"responder": "orders"'),
      toolCall(ROUTING_TOOL_NAME, { responder: 'orders', confidence: 1.5, reasoning: 'Sure' })
    );
    const router = new RouterService(ai, { enabled: ALL_RESPONDERS, temperature: 0.1 });

    await expect(router.route('one', [])).rejects.toMatchObject({ code: 'MALFORMED_TOOL_ARGUMENTS' });
    await expect(router.route('two', [])).rejects.toMatchObject({ code: 'MALFORMED_TOOL_ARGUMENTS' });
  });

  it('should reject calls to any other tool', async () => {
    const ai = new ScriptedAIProvider(toolCall('get_product_details', { product_id: 'eco-green' }));
    const router = new RouterService(ai, { enabled: ALL_RESPONDERS, temperature: 0.1 });

    await expect(router.route('Eco Green?', [])).rejects.toMatchObject({ code: 'UNKNOWN_TOOL' });
  });

  it('should refuse to start without an enabled responder', () => {
    const ai = new ScriptedAIProvider();

    expect(() => new RouterService(ai, { enabled: [], temperature: 0.1 })).toThrow(
      'At least one responder must be enabled'
    );
  });
});
