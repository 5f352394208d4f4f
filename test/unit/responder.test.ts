import { describe, it, expect, beforeEach } from 'vitest';
import { APOLOGY_MESSAGE, Responder, createResponderProfile } from '../../src/services/responders';
import { ChatMessage } from '../../src/types/ai-provider';
import { ResponderKind } from '../../src/types/conversation';
import { InMemoryCatalogStore, ScriptedAIProvider, text, toolCall } from './mocks';

const lastMessage = (messages: ChatMessage[]): ChatMessage => messages[messages.length - 1];

describe('Responder', () => {
  let store: InMemoryCatalogStore;

  beforeEach(() => {
    store = new InMemoryCatalogStore();
  });

  const build = (kind: ResponderKind, ai: ScriptedAIProvider) =>
    new Responder(createResponderProfile(kind, store), ai, { temperature: 0.7 });

  it('should return the first answer directly when no tool is requested', async () => {
    const ai = new ScriptedAIProvider(text('We have four mattresses.'));
    const responder = build('product_details', ai);

    const reply = await responder.respond('What do you sell?', [
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello!' },
    ]);

    expect(reply).toBe('We have four mattresses.');
    expect(ai.complete).toHaveBeenCalledTimes(1);

    const [request] = ai.requests;
    expect(request.temperature).toBe(0.7);
    expect(request.toolChoice).toBe('auto');
    expect(request.tools?.map((tool) => tool.name)).toEqual(['get_product_details', 'compare_products']);
    expect(request.messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(request.messages[0].content).toContain('Product ID: eco-green');
    expect(lastMessage(request.messages)).toEqual({ role: 'user', content: 'What do you sell?' });
  });

  it('should run the requested tool and ask again with its result', async () => {
    const ai = new ScriptedAIProvider(
      toolCall('get_product_details', { product_id: 'eco-green' }),
      text('The Eco Green is a latex mattress.')
    );
    const responder = build('product_details', ai);

    const reply = await responder.respond('Tell me about Eco Green', []);

    expect(reply).toBe('The Eco Green is a latex mattress.');
    expect(ai.complete).toHaveBeenCalledTimes(2);

    const followUp = ai.requests[1];
    expect(followUp.tools).toBeUndefined();
    expect(followUp.messages).toHaveLength(4);
    expect(followUp.messages[2]).toEqual({
      role: 'assistant',
      content: null,
      toolCall: { id: 'call-1', name: 'get_product_details', arguments: '{"product_id":"eco-green"}' },
    });

    const toolMessage = lastMessage(followUp.messages);
    expect(toolMessage).toMatchObject({ role: 'tool', toolCallId: 'call-1' });
    expect(JSON.parse(toolMessage.content ?? '')).toMatchObject({
      id: 'eco-green',
      name: 'Eco Green Mattress',
      price: 1199,
    });
  });

  it('should hand not-found results back to the model', async () => {
    const ai = new ScriptedAIProvider(
      toolCall('get_order_status', { order_id: 'NOPE' }),
      text("I couldn't find that order.")
    );
    const responder = build('orders', ai);

    const reply = await responder.respond('Where is order NOPE?', []);

    expect(reply).toBe("I couldn't find that order.");
    expect(JSON.parse(lastMessage(ai.requests[1].messages).content ?? '')).toEqual({
      error: 'ORDER_NOT_FOUND',
      message: 'Order not found: NOPE',
    });
  });

  it('should apologize when tool validation fails', async () => {
    const ai = new ScriptedAIProvider(
      toolCall('create_order', {
        product_id: 'eco-green',
        size: 'California King',
        delivery_address: '1 Test Street',
        payment_method: 'paypal',
      })
    );
    const responder = build('orders', ai);

    const reply = await responder.respond('Buy a California King Eco Green', []);

    expect(reply).toBe(APOLOGY_MESSAGE);
    expect(ai.complete).toHaveBeenCalledTimes(1);
    expect(store.orders).toHaveLength(0);
  });

  it('should apologize when the tool arguments are not valid JSON', async () => {
    const ai = new ScriptedAIProvider(toolCall('get_review_stats', '{"product_id": '));
    const responder = build('reviews', ai);

    await expect(responder.respond('Stats please', [])).resolves.toBe(APOLOGY_MESSAGE);
    expect(ai.complete).toHaveBeenCalledTimes(1);
  });

  it('should apologize when the model names a tool it was not given', async () => {
    const ai = new ScriptedAIProvider(toolCall('create_order', { product_id: 'eco-green' }));
    const responder = build('reviews', ai);

    await expect(responder.respond('Buy it', [])).resolves.toBe(APOLOGY_MESSAGE);
  });

  it('should apologize when the model asks for a second tool in the same turn', async () => {
    const ai = new ScriptedAIProvider(
      toolCall('get_review_stats', { product_id: 'dream-sleep' }),
      toolCall('get_product_reviews', { product_id: 'dream-sleep' }, 'call-2')
    );
    const responder = build('reviews', ai);

    await expect(responder.respond('How is Dream Sleep rated?', [])).resolves.toBe(APOLOGY_MESSAGE);
    expect(ai.complete).toHaveBeenCalledTimes(2);
  });

  it('should apologize when the model call fails', async () => {
    const ai = new ScriptedAIProvider(new Error('upstream timeout'));
    const responder = build('orders', ai);

    await expect(responder.respond('Hello', [])).resolves.toBe(APOLOGY_MESSAGE);
  });

  it('should store reviews requested by the model', async () => {
    const ai = new ScriptedAIProvider(
      toolCall('create_review', { product_id: 'dream-sleep', rating: 5, content: 'Best nap ever.' }),
      text('Thanks for your review!')
    );
    const responder = build('reviews', ai);

    await expect(responder.respond('Leave 5 stars for Dream Sleep', [])).resolves.toBe(
      'Thanks for your review!'
    );
    expect(store.reviews[store.reviews.length - 1]).toMatchObject({
      productId: 'dream-sleep',
      rating: 5,
      content: 'Best nap ever.',
    });
  });
});
