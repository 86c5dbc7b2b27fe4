import chatConfig from './chat.config';

describe('chat config', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('uses the built-in defaults', () => {
    delete process.env.CHAT_HISTORY_SIZE;
    delete process.env.CHAT_MAX_SESSIONS;
    delete process.env.KNOWLEDGE_WIKI_ENABLED;
    delete process.env.KNOWLEDGE_SUMMARY_SENTENCES;
    delete process.env.SYSTEM_PROMPT_CHAT;
    delete process.env.SYSTEM_PROMPT_CODE;
    delete process.env.SYSTEM_PROMPT_KNOWLEDGE;

    expect(chatConfig()).toEqual({
      historyCapacity: 40,
      maxSessions: 1000,
      enrichKnowledgeMode: true,
      enrichmentSentences: 4,
      systemPrompts: {},
    });
  });

  it('reads overrides from the environment', () => {
    process.env.CHAT_HISTORY_SIZE = '12';
    process.env.KNOWLEDGE_WIKI_ENABLED = 'false';
    process.env.SYSTEM_PROMPT_KNOWLEDGE = 'Cite everything.';

    expect(chatConfig()).toMatchObject({
      historyCapacity: 12,
      enrichKnowledgeMode: false,
      systemPrompts: { knowledge: 'Cite everything.' },
    });
  });

  it.each([
    ['0', false],
    ['1', true],
    ['true', true],
  ])('reads KNOWLEDGE_WIKI_ENABLED=%s as %s', (value, expected) => {
    process.env.KNOWLEDGE_WIKI_ENABLED = value;

    expect(chatConfig().enrichKnowledgeMode).toBe(expected);
  });
});
