import { describe, it, expect } from 'vitest';

import { ConversationMemory } from '../../src/memory/index.js';

describe('ConversationMemory', () => {
  it('keeps messages in append order and freezes them', () => {
    const memory = new ConversationMemory();
    memory.append('user', 'Hello');
    const reply = memory.append('assistant', 'Hi there', { handlers_used: [] });

    expect(memory.size).toBe(2);
    expect(memory.messages.map(m => m.content)).toEqual(['Hello', 'Hi there']);
    expect(Object.isFrozen(reply)).toBe(true);
    expect(Object.isFrozen(reply.metadata)).toBe(true);
  });

  it('returns the last maxTurns exchanges', () => {
    const memory = new ConversationMemory();
    for (let i = 1; i <= 4; i++) {
      memory.append('user', `question ${i}`);
      memory.append('assistant', `answer ${i}`);
    }

    expect(memory.history(1)).toEqual([
      { role: 'user', content: 'question 4' },
      { role: 'assistant', content: 'answer 4' }
    ]);
    expect(memory.history(0)).toEqual([]);
    expect(memory.history()).toHaveLength(8);
  });

  it('overwrites facts by key', () => {
    const memory = new ConversationMemory();
    memory.setFact('order_id', 'ORD-001');
    memory.setFact('order_id', 'ORD-002');

    expect(memory.getFact('order_id')).toBe('ORD-002');
    expect(memory.getFact('product_id')).toBeUndefined();
  });

  it('summarizes without counting the message being processed', () => {
    const memory = new ConversationMemory();
    memory.append('user', 'Track ORD-001');
    memory.append('assistant', 'It has shipped.');
    memory.append('user', 'When will it arrive?');
    memory.setFact('order_id', 'ORD-001');
    memory.setFact('last_topic', 'tracking');

    expect(memory.summary()).toEqual({
      prior_messages: 2,
      last_topic: 'tracking',
      last_order_id: 'ORD-001',
      last_product_id: null
    });
  });

  it('clears messages and facts on reset', () => {
    const memory = new ConversationMemory();
    memory.append('user', 'Track ORD-001');
    memory.setFact('order_id', 'ORD-001');

    memory.reset();

    expect(memory.size).toBe(0);
    expect(memory.summary()).toEqual({
      prior_messages: 0,
      last_topic: null,
      last_order_id: null,
      last_product_id: null
    });
  });
});
