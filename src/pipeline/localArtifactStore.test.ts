import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import { ValidationError } from '../../server/errors';
import { LocalArtifactStore } from './localArtifactStore';

const transcriptJson = {
  conversation_id: 'conv-42',
  channel: 'VOICE',
  started_at: '2025-12-28T09:00:00+11:00',
  turns: [
    { turn_index: 0, speaker: 'AGENT', text: 'Good morning.', ts_offset_sec: 0 },
    { turn_index: 1, speaker: 'CUSTOMER', text: 'Hi, I lost my job last month.', ts_offset_sec: 2.5 },
  ],
};

const metadataJson = {
  conversation_id: 'conv-42',
  agent_id: 'agent-3',
  queue: 'collections',
  crm_ref: 'X-1',
};

describe('LocalArtifactStore', () => {
  let root: string;

  async function writeConversation(dir: string, transcript: unknown, metadata: unknown = metadataJson): Promise<void> {
    await mkdir(path.join(root, dir), { recursive: true });
    await writeFile(path.join(root, dir, 'transcription.json'), JSON.stringify(transcript));
    await writeFile(path.join(root, dir, 'metadata.json'), JSON.stringify(metadata));
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('reads and maps both artifacts from a relative uri', async () => {
    await writeConversation('2025-12-28/conv-42', transcriptJson);
    const store = new LocalArtifactStore(root);

    const { transcript, metadata } = await store.readConversationArtifacts('2025-12-28/conv-42');

    expect(transcript.conversationId).toBe('conv-42');
    expect(transcript.language).toBe('en-AU');
    expect(transcript.turns[1]).toEqual({
      index: 1,
      speakerRole: 'CUSTOMER',
      text: 'Hi, I lost my job last month.',
      startOffsetSeconds: 2.5,
    });
    expect(metadata.agent_id).toBe('agent-3');
    expect(metadata.crm_ref).toBe('X-1');
  });

  it('returns a frozen transcript', async () => {
    await writeConversation('conv-42', transcriptJson);
    const store = new LocalArtifactStore(root);

    const { transcript } = await store.readConversationArtifacts('conv-42');

    expect(Object.isFrozen(transcript)).toBe(true);
    expect(Object.isFrozen(transcript.turns)).toBe(true);
    expect(Object.isFrozen(transcript.turns[0])).toBe(true);
  });

  it('accepts file:// uris', async () => {
    await writeConversation('conv-42', transcriptJson);
    const store = new LocalArtifactStore('/unused');

    const { transcript } = await store.readConversationArtifacts(pathToFileURL(path.join(root, 'conv-42')).href);

    expect(transcript.turns).toHaveLength(2);
  });

  it('accepts an empty turn list', async () => {
    await writeConversation('conv-42', { ...transcriptJson, turns: [] });
    const store = new LocalArtifactStore(root);

    const { transcript } = await store.readConversationArtifacts('conv-42');

    expect(transcript.turns).toEqual([]);
  });

  it('rejects turn indexes that are not 0..n-1 in order', async () => {
    const turns = [transcriptJson.turns[1], transcriptJson.turns[0]];
    await writeConversation('conv-42', { ...transcriptJson, turns });
    const store = new LocalArtifactStore(root);

    await expect(store.readConversationArtifacts('conv-42')).rejects.toThrow(
      'Invalid transcription.json: turns.0.turn_index: Expected turn_index 0, got 1; turns.1.turn_index: Expected turn_index 1, got 0',
    );
  });

  it('rejects an unknown speaker role', async () => {
    const turns = [{ turn_index: 0, speaker: 'SUPERVISOR', text: 'Hello', ts_offset_sec: 0 }];
    await writeConversation('conv-42', { ...transcriptJson, turns });
    const store = new LocalArtifactStore(root);

    await expect(store.readConversationArtifacts('conv-42')).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports a missing directory as a validation error', async () => {
    const store = new LocalArtifactStore(root);

    await expect(store.readConversationArtifacts('missing')).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports invalid JSON as a validation error', async () => {
    await writeConversation('conv-42', transcriptJson);
    await writeFile(path.join(root, 'conv-42', 'metadata.json'), '{ not json');
    const store = new LocalArtifactStore(root);

    await expect(store.readConversationArtifacts('conv-42')).rejects.toThrow(/^Invalid JSON in /);
  });
});
