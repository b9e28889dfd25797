import { SessionHistory } from '../src/application/services/SessionHistory.js';
import { SessionRegistry } from '../src/application/services/SessionRegistry.js';

describe('SessionRegistry', () => {
  it('creates a history on first reference and returns the same object afterwards', () => {
    const registry = new SessionRegistry();

    const first = registry.getOrCreate('alpha');
    first.append('user', 'hello');
    const second = registry.getOrCreate('alpha');

    expect(second).toBe(first);
    expect(second.length).toBe(1);
    expect(registry.size).toBe(1);
  });

  it('keeps sessions independent', () => {
    const registry = new SessionRegistry();

    registry.getOrCreate('alpha').append('user', 'one');
    registry.getOrCreate('beta').append('user', 'two');
    registry.getOrCreate('beta').append('assistant', 'three');

    expect(registry.getSessionIds()).toEqual(['alpha', 'beta']);
    expect(registry.getOrCreate('alpha').length).toBe(1);
    expect(registry.getTotalMessages()).toBe(3);
  });

  it('reports whether a session exists without creating it', () => {
    const registry = new SessionRegistry();

    expect(registry.has('ghost')).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('does not share state between registries', () => {
    const a = new SessionRegistry();
    const b = new SessionRegistry();

    a.getOrCreate('shared').append('user', 'only in a');

    expect(b.getOrCreate('shared').length).toBe(0);
  });
});

describe('SessionHistory', () => {
  it('preserves insertion order', () => {
    const history = new SessionHistory('s1');

    history.append('user', 'first');
    history.append('assistant', 'second');
    history.append('user', 'third');

    expect(history.messages.map((m) => m.content)).toEqual(['first', 'second', 'third']);
  });

  it('freezes appended messages and their metadata', () => {
    const history = new SessionHistory('s1');
    const metadata = { response_type: 'standard' };

    const message = history.append('user', 'hi', metadata);
    metadata.response_type = 'creative';

    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.metadata)).toBe(true);
    expect(message.metadata).toEqual({ response_type: 'standard' });
  });

  it('clears all messages', () => {
    const history = new SessionHistory('s1');
    history.append('user', 'hi');

    history.clear();

    expect(history.length).toBe(0);
    expect(history.messages).toEqual([]);
  });
});
