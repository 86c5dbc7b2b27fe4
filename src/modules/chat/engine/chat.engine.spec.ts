import { DEFAULT_SYSTEM_PROMPTS } from '../../core/prompts';
import { UnavailableCompletionClient } from '../../core/completion/unavailable-completion.client';
import type { EnrichmentClient } from '../../knowledge/enrichment/enrichment-client.interface';
import { FakeCompletionClient, FakeEnrichmentClient } from '../testing/fake-clients';
import { ChatEngine } from './chat.engine';
import type { ChatEngineOptions } from './chat-engine.types';

const PREFIX = "[Local fallback] I can't reach the model. Echo: ";

function createEngine(
    completion = FakeCompletionClient.replying('ok'),
    enrichment: EnrichmentClient = FakeEnrichmentClient.withSummary('Paris is the capital of France.'),
    options: Partial<ChatEngineOptions> = {},
) {
    const engine = new ChatEngine(
        { historyCapacity: 40, enrichKnowledgeMode: true, enrichmentSentences: 4, ...options },
        { completion, enrichment },
    );
    return { engine, completion, enrichment };
}

describe('ChatEngine', () => {
    describe('respond', () => {
        it('returns the model reply and records both sides of the turn', async () => {
            const { engine } = createEngine(FakeCompletionClient.replying('Hi there!'));

            await expect(engine.respond('Hello', 'chat')).resolves.toBe('Hi there!');
            expect(engine.getHistory()).toEqual([
                { role: 'user', content: 'Hello' },
                { role: 'assistant', content: 'Hi there!' },
            ]);
        });

        it('sends the mode prompt followed by history ending with the new user message', async () => {
            const { engine, completion } = createEngine();

            await engine.respond('first', 'chat');
            await engine.respond('second', 'Programming');

            expect(completion.lastRequest).toEqual([
                { role: 'system', content: DEFAULT_SYSTEM_PROMPTS.code },
                { role: 'user', content: 'first' },
                { role: 'assistant', content: 'ok' },
                { role: 'user', content: 'second' },
            ]);
        });

        it('uses chat mode for unrecognized labels', async () => {
            const { engine, completion } = createEngine();

            const result = await engine.runTurn('hey', 'banana');

            expect(result.mode).toBe('chat');
            expect(completion.lastRequest?.[0]).toEqual({ role: 'system', content: DEFAULT_SYSTEM_PROMPTS.chat });
        });

        it('keeps only the newest messages once capacity is exceeded', async () => {
            const { engine } = createEngine(FakeCompletionClient.replying('ok'), undefined, { historyCapacity: 4 });

            await engine.respond('one', 'chat');
            await engine.respond('two', 'chat');
            await engine.respond('three', 'chat');

            expect(engine.getHistory()).toEqual([
                { role: 'user', content: 'two' },
                { role: 'assistant', content: 'ok' },
                { role: 'user', content: 'three' },
                { role: 'assistant', content: 'ok' },
            ]);
        });

        it('reports the model and token usage of a successful turn', async () => {
            const { engine } = createEngine();

            await expect(engine.runTurn('hi')).resolves.toEqual({
                reply: 'ok',
                mode: 'chat',
                usedFallback: false,
                enriched: false,
                model: 'test-model',
                tokensUsed: 12,
            });
        });
    });

    describe('fallback', () => {
        it('echoes the user message when the completion fails', async () => {
            const { engine } = createEngine(FakeCompletionClient.failing());

            await expect(engine.respond('Are you there?', 'chat')).resolves.toBe(`${PREFIX}Are you there?`);
        });

        it('truncates the echoed message to 400 characters', async () => {
            const { engine } = createEngine(FakeCompletionClient.failing());
            const input = 'y'.repeat(500);

            const reply = await engine.respond(input, 'chat');

            expect(reply).toBe(PREFIX + 'y'.repeat(400));
        });

        it('treats an unconfigured client like a failed call', async () => {
            const unconfigured = new ChatEngine(
                { historyCapacity: 40, enrichKnowledgeMode: false, enrichmentSentences: 4 },
                { completion: new UnavailableCompletionClient('no key'), enrichment: FakeEnrichmentClient.failing() },
            );

            const result = await unconfigured.runTurn('ping', 'code');

            expect(result).toEqual({
                reply: `${PREFIX}ping`,
                mode: 'code',
                usedFallback: true,
                enriched: false,
                model: undefined,
                tokensUsed: undefined,
            });
        });

        it('recovers when the completion client rejects', async () => {
            const { engine } = createEngine(
                new FakeCompletionClient(() => Promise.reject(new Error('socket hang up'))),
            );

            await expect(engine.respond('still here', 'chat')).resolves.toBe(`${PREFIX}still here`);
            expect(engine.getHistory()[1]).toEqual({ role: 'assistant', content: `${PREFIX}still here` });
        });
    });

    describe('knowledge enrichment', () => {
        it('attaches the summary as a second system message', async () => {
            const enrichment = FakeEnrichmentClient.withSummary('  Paris is the capital of France.  ');
            const { engine, completion } = createEngine(FakeCompletionClient.replying('ok'), enrichment);

            const result = await engine.runTurn('Paris', 'facts');

            expect(result.enriched).toBe(true);
            expect(enrichment.queries).toEqual([{ query: 'Paris', sentences: 4 }]);
            expect(completion.lastRequest?.[1]).toEqual({
                role: 'system',
                content:
                    'Use the following external context to answer. Cite it naturally when used.\n' +
                    '\n[External Source: Wikipedia]\nParis is the capital of France.\n[End Source]\n',
            });
        });

        it('never stores the context in history', async () => {
            const { engine } = createEngine();

            await engine.respond('Paris', 'knowledge');

            expect(engine.getHistory().map((m) => m.role)).toEqual(['user', 'assistant']);
        });

        it('sends a single system message when the summary is empty', async () => {
            const { engine, completion } = createEngine(FakeCompletionClient.replying('ok'), FakeEnrichmentClient.withSummary(''));

            const result = await engine.runTurn('Nothing', 'knowledge');

            expect(result.enriched).toBe(false);
            expect(completion.lastRequest?.filter((m) => m.role === 'system')).toHaveLength(1);
        });

        it('proceeds without context when the lookup fails', async () => {
            const { engine, completion } = createEngine(FakeCompletionClient.replying('ok'), FakeEnrichmentClient.failing('ambiguous'));

            await expect(engine.respond('Mercury', 'knowledge')).resolves.toBe('ok');
            expect(completion.lastRequest?.filter((m) => m.role === 'system')).toHaveLength(1);
        });

        it('proceeds without context when the lookup rejects', async () => {
            const rejecting: EnrichmentClient = { lookup: () => Promise.reject(new Error('network down')) };
            const { engine } = createEngine(FakeCompletionClient.replying('ok'), rejecting);

            await expect(engine.runTurn('Mercury', 'knowledge')).resolves.toMatchObject({ reply: 'ok', enriched: false });
        });

        it('does not look anything up outside knowledge mode', async () => {
            const enrichment = FakeEnrichmentClient.withSummary('unused');
            const { engine } = createEngine(FakeCompletionClient.replying('ok'), enrichment);

            await engine.respond('Paris', 'chat');
            await engine.respond('Paris', 'code');

            expect(enrichment.queries).toEqual([]);
        });

        it('does not look anything up when enrichment is disabled', async () => {
            const enrichment = FakeEnrichmentClient.withSummary('unused');
            const { engine } = createEngine(FakeCompletionClient.replying('ok'), enrichment, { enrichKnowledgeMode: false });

            const result = await engine.runTurn('Paris', 'knowledge');

            expect(result.enriched).toBe(false);
            expect(enrichment.queries).toEqual([]);
        });
    });

    describe('administration', () => {
        it('uses an updated system prompt on the next turn', async () => {
            const { engine, completion } = createEngine();

            engine.setSystemPrompt('chat', 'Reply in French.');
            await engine.respond('Hello');

            expect(engine.getSystemPrompt('chat')).toBe('Reply in French.');
            expect(completion.lastRequest?.[0]).toEqual({ role: 'system', content: 'Reply in French.' });
        });

        it('applies initial prompt overrides', () => {
            const { engine } = createEngine(undefined, undefined, {
                systemPrompts: { ...DEFAULT_SYSTEM_PROMPTS, code: 'Be terse.' },
            });

            expect(engine.getSystemPrompts()).toEqual({ ...DEFAULT_SYSTEM_PROMPTS, code: 'Be terse.' });
        });

        it('clears history on reset', async () => {
            const { engine } = createEngine();
            await engine.respond('Hello');

            engine.reset();

            expect(engine.getHistory()).toEqual([]);
        });
    });
});
