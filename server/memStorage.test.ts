import { describe, it, expect } from 'vitest';
import { MemStorage } from './memStorage';
import { RegistryStateMachine } from './services/registryStateHelper';

const t0 = new Date('2025-12-28T09:00:00Z');
const t1 = new Date('2025-12-28T09:05:00Z');

describe('MemStorage', () => {
  it('keeps the first row on insertIfAbsent', async () => {
    const storage = new MemStorage();
    await storage.insertIfAbsent(RegistryStateMachine.newRecord('conv-1', '/a', t0));

    const second = await storage.insertIfAbsent(RegistryStateMachine.newRecord('conv-1', '/b', t1));

    expect(second.sourceUri).toBe('/a');
    expect(second.createdAt).toEqual(t0);
  });

  it('replaces the row on upsert but keeps createdAt', async () => {
    const storage = new MemStorage();
    const record = await storage.insertIfAbsent(RegistryStateMachine.newRecord('conv-1', '/a', t0));

    await storage.upsertConversation({ ...RegistryStateMachine.applyTransition(record, 'INGESTED', t1), createdAt: t1 });

    const stored = await storage.getConversation('conv-1');
    expect(stored?.status).toBe('INGESTED');
    expect(stored?.createdAt).toEqual(t0);
  });

  it('returns copies that callers cannot use to mutate the store', async () => {
    const storage = new MemStorage();
    const record = await storage.insertIfAbsent(RegistryStateMachine.newRecord('conv-1', '/a', t0));

    record.status = 'COACHED';

    expect((await storage.getConversation('conv-1'))?.status).toBe('NEW');
  });

  it('lists by status, most recently updated first, up to the limit', async () => {
    const storage = new MemStorage();
    await storage.upsertConversation({ ...RegistryStateMachine.newRecord('a', null, t0), status: 'FAILED_ENRICH' });
    await storage.upsertConversation({ ...RegistryStateMachine.newRecord('b', null, t1), status: 'FAILED_ENRICH' });
    await storage.upsertConversation(RegistryStateMachine.newRecord('c', null, t1));

    const failed = await storage.listConversations({ status: 'FAILED_ENRICH' });
    const limited = await storage.listConversations({ limit: 1 });

    expect(failed.map(r => r.conversationId)).toEqual(['b', 'a']);
    expect(limited).toHaveLength(1);
  });

  it('appends frozen audit entries with increasing ids', async () => {
    const storage = new MemStorage(() => t1);
    const entry = {
      conversationId: 'conv-1',
      catalogVersion: 'v1',
      matchCount: 1,
      flags: ['AGENT_EMPATHY_SHOWN' as const],
      matches: [{ matcherId: 'empathy_indicators', matchedPhrase: 'I understand', turnIndex: 0, speakerRole: 'AGENT' as const }],
    };

    const first = await storage.appendAudit(entry);
    const second = await storage.appendAudit(entry);

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(first.recordedAt).toEqual(t1);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.matches[0])).toBe(true);
    expect(await storage.listAudit('conv-1')).toHaveLength(2);
    expect(await storage.listAudit('conv-2')).toEqual([]);
  });
});
