import path from 'path';
import { ConversationManager } from '../src/application/services/ConversationManager.js';
import { DatabaseConnection, resolveDatabasePath } from '../src/infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from '../src/infrastructure/database/repositories/ConversationRepository.js';

describe('resolveDatabasePath', () => {
  it('understands sqlite URLs and plain paths', () => {
    expect(resolveDatabasePath('sqlite:///var/data/chat.db')).toBe('/var/data/chat.db');
    expect(resolveDatabasePath('sqlite://chat.db', '/srv')).toBe(path.resolve('/srv', 'chat.db'));
    expect(resolveDatabasePath('sqlite:data/chat.db', '/srv')).toBe(path.resolve('/srv', 'data/chat.db'));
    expect(resolveDatabasePath('chat.db', '/srv')).toBe(path.resolve('/srv', 'chat.db'));
  });

  it('keeps in-memory databases in memory', () => {
    expect(resolveDatabasePath(':memory:')).toBe(':memory:');
    expect(resolveDatabasePath('sqlite://:memory:')).toBe(':memory:');
  });
});

describe('ConversationRepository', () => {
  let connection: DatabaseConnection;
  let repo: ConversationRepository;

  beforeEach(() => {
    // Use in-memory database for tests
    connection = new DatabaseConnection(':memory:');
    repo = new ConversationRepository(connection.getDatabase());
  });

  afterEach(() => {
    connection.close();
  });

  test('should save and retrieve messages in order', () => {
    repo.saveMessage('session1', 1, 'assistant', 'Hi there', { temperature: 0.7 });
    repo.saveMessage('session1', 0, 'user', 'Hello', { response_type: 'standard' });

    const messages = repo.getHistory('session1');

    expect(messages.map((m) => [m.message_index, m.role, m.content])).toEqual([
      [0, 'user', 'Hello'],
      [1, 'assistant', 'Hi there'],
    ]);
    expect(messages[0].metadata).toBe('{"response_type":"standard"}');
  });

  test('should store null metadata when none is given', () => {
    repo.saveMessage('session1', 0, 'user', 'Hello');

    expect(repo.getHistory('session1')[0].metadata).toBeNull();
  });

  test('should replace a message saved at the same index', () => {
    repo.saveMessage('session1', 0, 'user', 'First draft');
    repo.saveMessage('session1', 0, 'user', 'Final');

    const messages = repo.getHistory('session1');
    expect(messages).toHaveLength(1);
    expect(messages[0].content).toBe('Final');
  });

  test('should handle multiple sessions independently', () => {
    repo.saveMessage('session1', 0, 'user', 'Session 1 message');
    repo.saveMessage('session2', 0, 'user', 'Session 2 message');
    repo.saveMessage('session2', 1, 'assistant', 'Reply');

    expect(repo.getHistory('session1')).toHaveLength(1);
    expect(repo.getHistory('session2')).toHaveLength(2);

    const sessions = repo.getAllSessions();
    expect(sessions.map((s) => [s.session_id, s.message_count]).sort()).toEqual([
      ['session1', 1],
      ['session2', 2],
    ]);
  });

  test('should clear only the given session', () => {
    repo.saveMessage('session1', 0, 'user', 'Keep me');
    repo.saveMessage('session2', 0, 'user', 'Delete me');

    repo.clearHistory('session2');

    expect(repo.getHistory('session2')).toEqual([]);
    expect(repo.getHistory('session1')).toHaveLength(1);
  });

  test('should report the next free index per session', () => {
    expect(repo.getNextMessageIndex('session1')).toBe(0);

    repo.saveMessage('session1', 0, 'user', 'a');
    repo.saveMessage('session1', 1, 'assistant', 'b');

    expect(repo.getNextMessageIndex('session1')).toBe(2);
    expect(repo.getNextMessageIndex('session2')).toBe(0);
  });

  test('should append after archived turns when a session manager is recreated', () => {
    const before = new ConversationManager('session1', { archive: repo });
    before.addUserMessage('first question');
    before.addAssistantMessage('first answer');

    const after = new ConversationManager('session1', { archive: repo });
    after.addUserMessage('after restart');

    expect(repo.getHistory('session1').map((m) => [m.message_index, m.content])).toEqual([
      [0, 'first question'],
      [1, 'first answer'],
      [2, 'after restart'],
    ]);
  });

  test('should start again from index 0 after a manager clears the session', () => {
    repo.saveMessage('session1', 0, 'user', 'old');
    const manager = new ConversationManager('session1', { archive: repo });
    manager.addAssistantMessage('old reply');

    manager.clear();
    manager.addUserMessage('fresh');

    expect(repo.getHistory('session1').map((m) => [m.message_index, m.content])).toEqual([[0, 'fresh']]);
  });

  test('should report statistics', () => {
    repo.saveMessage('session1', 0, 'user', 'a');
    repo.saveMessage('session1', 1, 'assistant', 'b');
    repo.saveMessage('session2', 0, 'user', 'c');

    expect(connection.getStatistics()).toEqual({ totalMessages: 3, totalSessions: 2, databaseSize: 0 });
    expect(connection.getDatabasePath()).toBe(':memory:');
  });
});
