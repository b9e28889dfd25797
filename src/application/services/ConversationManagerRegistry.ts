import { ConversationManager, ConversationManagerOptions } from './ConversationManager.js';

/**
 * One ConversationManager per UI session
 */
export class ConversationManagerRegistry {
  private managers: Map<string, ConversationManager> = new Map();

  constructor(private managerOptions: ConversationManagerOptions = {}) {}

  getOrCreate(sessionId: string): ConversationManager {
    let manager = this.managers.get(sessionId);
    if (!manager) {
      manager = new ConversationManager(sessionId, this.managerOptions);
      this.managers.set(sessionId, manager);
    }
    return manager;
  }

  get(sessionId: string): ConversationManager | undefined {
    return this.managers.get(sessionId);
  }

  list(): Array<{ sessionId: string; messageCount: number; responseStyle: string }> {
    return Array.from(this.managers.values()).map((manager) => ({
      sessionId: manager.sessionId,
      messageCount: manager.getMessages().length,
      responseStyle: manager.getResponseStyle(),
    }));
  }
}
