/**
 * Turn Orchestrator Tests
 */

import { describe, it, expect } from 'vitest';
import { CANCELLED_REPLY, TurnOrchestrator, type TransitionInfo } from '../orchestrator.js';
import { canTransition, isTerminal, type TurnState } from '../state.js';
import { createToolRegistry } from '../../tools/catalogue.js';
import type { ToolRegistry } from '../../tools/registry.js';
import { ConversationContext } from '../../session/conversation-context.js';
import { ModelUnavailableError } from '../../types/errors.js';
import { OllamaClient } from '../../llm/ollama.client.js';
import { buildDispatchPrompt } from '../../context/prompts/dispatch-prompt.js';
import { ANSWER_SYNTHESIS_PROMPT, buildSynthesisRequest, renderPayload } from '../../context/prompts/answer-synthesis.js';
import {
  ScriptedLLM,
  commentsAdapter,
  postAdapter,
  samplePost,
  silentTransport,
  type FakeAdapter,
  type ScriptStep
} from '../../__tests__/fakes.js';
import type { Comment, Post } from '../../adapters/schemas.js';

interface Harness {
  llm: ScriptedLLM;
  registry: ToolRegistry;
  post: FakeAdapter<Post>;
  comments: FakeAdapter<Comment[]>;
  states: TurnState[];
  orchestrator: TurnOrchestrator;
}

function setup(steps: ScriptStep[], options: { synthesize?: boolean } = {}): Harness {
  const post = postAdapter();
  const comments = commentsAdapter();
  const registry = createToolRegistry({ post, comments });
  const llm = new ScriptedLLM(steps);
  const states: TurnState[] = [];
  const orchestrator = new TurnOrchestrator({
    llm,
    registry,
    synthesize: options.synthesize,
    onTransition: (info: TransitionInfo) => states.push(info.to)
  });
  return { llm, registry, post, comments, states, orchestrator };
}

const POST_2_CALL = '{"tool": "post_call", "args": {"post_id": 2}}';

describe('turn state table', () => {
  it('should allow only forward transitions', () => {
    expect(canTransition('AWAITING_QUERY', 'PROMPTING_MODEL')).toBe(true);
    expect(canTransition('PARSING_OUTPUT', 'SYNTHESIZING_ANSWER')).toBe(true);
    expect(canTransition('PROMPTING_MODEL', 'DISPATCHING_TOOL')).toBe(false);
    expect(canTransition('DONE', 'PROMPTING_MODEL')).toBe(false);
  });

  it('should allow ERROR and CANCELLED from any non-terminal state', () => {
    expect(canTransition('DISPATCHING_TOOL', 'ERROR')).toBe(true);
    expect(canTransition('AWAITING_QUERY', 'CANCELLED')).toBe(true);
    expect(canTransition('ERROR', 'CANCELLED')).toBe(false);
    expect(isTerminal('CANCELLED')).toBe(true);
  });
});

describe('TurnOrchestrator', () => {
  it('should return a direct answer without dispatching', async () => {
    const h = setup(['Hello! Ask me about a post.']);
    const context = new ConversationContext('s1');

    const { result, context: next } = await h.orchestrator.run('hi', context);

    expect(result).toEqual({ status: 'done', finalText: 'Hello! Ask me about a post.' });
    expect(h.states).toEqual(['PROMPTING_MODEL', 'PARSING_OUTPUT', 'SYNTHESIZING_ANSWER', 'DONE']);
    expect(h.post.calls).toEqual([]);
    expect(next.turnCount).toBe(1);
    expect(next.history).toEqual([{ query: 'hi', answer: 'Hello! Ask me about a post.' }]);
    expect(context.turnCount).toBe(0);
  });

  it('should dispatch a tool call and phrase the result', async () => {
    const h = setup([POST_2_CALL, 'Post 2 is called "title 2".']);
    const context = new ConversationContext('s1');

    const { result, context: next } = await h.orchestrator.run('show me post 2', context);

    expect(result.status).toBe('done');
    expect(result.finalText).toBe('Post 2 is called "title 2".');
    expect(result.invokedTool?.toJSON()).toEqual({ tool: 'post_call', args: { post_id: 2 } });
    expect(result.toolResult).toEqual({ toolName: 'post_call', status: 'ok', payload: samplePost(2) });
    expect(h.states).toEqual([
      'PROMPTING_MODEL',
      'PARSING_OUTPUT',
      'DISPATCHING_TOOL',
      'SYNTHESIZING_ANSWER',
      'DONE'
    ]);
    expect(h.post.calls).toEqual([2]);
    expect(next.lastEntity('post')).toBe(2);
    expect(context.lastEntity('post')).toBeUndefined();
    expect(h.orchestrator.currentState).toBe('DONE');
  });

  it('should send the catalogue and then the fetched data to the model', async () => {
    const h = setup([POST_2_CALL, 'Done.']);

    await h.orchestrator.run('show me post 2', new ConversationContext('s1'));

    expect(h.llm.calls[0]?.messages).toEqual([
      { role: 'system', content: buildDispatchPrompt(h.registry) },
      { role: 'user', content: 'show me post 2' }
    ]);
    expect(h.llm.calls[1]?.messages).toEqual([
      { role: 'system', content: ANSWER_SYNTHESIS_PROMPT },
      { role: 'user', content: buildSynthesisRequest('show me post 2', 'post_call', samplePost(2)) }
    ]);
  });

  it('should include history and rewrite references in the prompt', async () => {
    const h = setup(['{"tool": "comments_call", "args": {"post_id": "that post"}}', 'Two comments.']);
    const context = new ConversationContext('s1');
    context.record('post', 2);
    context.recordExchange('show me post 2', 'Post 2 is called "title 2".');

    const { result } = await h.orchestrator.run('comments on that post', context);

    expect(h.llm.calls[0]?.messages.slice(1)).toEqual([
      { role: 'user', content: 'show me post 2' },
      { role: 'assistant', content: 'Post 2 is called "title 2".' },
      { role: 'user', content: 'comments on post 2' }
    ]);
    expect(result.invokedTool?.args).toEqual({ post_id: 2 });
    expect(h.comments.calls).toEqual([2]);
  });

  it('should return the payload as JSON when phrasing is off', async () => {
    const h = setup([POST_2_CALL], { synthesize: false });

    const { result } = await h.orchestrator.run('show me post 2', new ConversationContext('s1'));

    expect(result.finalText).toBe(renderPayload(samplePost(2)));
    expect(h.llm.calls).toHaveLength(1);
  });

  it('should answer a missing post without recording it', async () => {
    const h = setup(['{"tool": "post_call", "args": {"post_id": 99}}']);

    const { result, context } = await h.orchestrator.run('show me post 99', new ConversationContext('s1'));

    expect(result.status).toBe('done');
    expect(result.finalText).toBe('No such post: there is no post with id 99.');
    expect(result.toolResult?.status).toBe('not_found');
    expect(context.lastEntity('post')).toBeUndefined();
    expect(context.turnCount).toBe(1);
    expect(h.llm.calls).toHaveLength(1);
  });

  it('should refuse an unknown tool and leave the context alone', async () => {
    const h = setup(['{"tool": "delete_everything", "args": {}}']);
    const context = new ConversationContext('s1');
    context.record('post', 2);

    const outcome = await h.orchestrator.run('delete everything', context);

    expect(outcome.result.status).toBe('error');
    expect(outcome.result.finalText).toBe('I can\'t do that: "delete_everything" is not an available tool.');
    expect(outcome.result.error?.code).toBe('UNKNOWN_TOOL');
    expect(outcome.context).toBe(context);
    expect(context.turnCount).toBe(0);
    expect(h.states).toEqual(['PROMPTING_MODEL', 'PARSING_OUTPUT', 'ERROR']);
    expect(h.post.calls).toEqual([]);
  });

  it('should fail a reference with nothing to point back to', async () => {
    const h = setup(['{"tool": "post_call", "args": {"post_id": "that post"}}']);

    const { result } = await h.orchestrator.run('show that post', new ConversationContext('s1'));

    expect(result.error?.code).toBe('NO_PRIOR_REFERENCE');
    expect(result.finalText).toBe("I don't know which post you mean yet. Please give its number.");
    expect(h.post.calls).toEqual([]);
  });

  it('should refuse ambiguous output', async () => {
    const h = setup([`${POST_2_CALL} ${POST_2_CALL}`]);

    const { result } = await h.orchestrator.run('show me post 2', new ConversationContext('s1'));

    expect(result.error?.code).toBe('AMBIGUOUS_OUTPUT');
    expect(result.finalText).toBe("I couldn't understand how to look that up. Please rephrase your request.");
  });

  it('should report an unreachable model', async () => {
    const h = setup([new ModelUnavailableError('Ollama API error: connection refused')]);

    const { result } = await h.orchestrator.run('hi', new ConversationContext('s1'));

    expect(result.status).toBe('error');
    expect(result.error).toEqual({ code: 'MODEL_UNAVAILABLE', message: 'Ollama API error: connection refused' });
    expect(h.states).toEqual(['PROMPTING_MODEL', 'ERROR']);
  });

  it('should end in ERROR when the model times out', async () => {
    const llm = new OllamaClient({
      baseUrl: 'http://ollama.test:11434',
      model: 'mistral',
      timeout: 50,
      fetch: silentTransport()
    });
    const post = postAdapter();
    const states: TurnState[] = [];
    const orchestrator = new TurnOrchestrator({
      llm,
      registry: createToolRegistry({ post, comments: commentsAdapter() }),
      onTransition: (info: TransitionInfo) => states.push(info.to)
    });
    const context = new ConversationContext('s1');
    context.record('post', 3);

    const outcome = await orchestrator.run('show me that post', context);

    expect(outcome.result).toEqual({
      status: 'error',
      finalText: 'The language model is not reachable right now. Please try again later.',
      error: { code: 'MODEL_UNAVAILABLE', message: 'Ollama API error: timed out after 50ms' }
    });
    expect(states).toEqual(['PROMPTING_MODEL', 'ERROR']);
    expect(outcome.context).toBe(context);
    expect(context.lastEntity('post')).toBe(3);
    expect(context.turnCount).toBe(0);
    expect(post.calls).toEqual([]);
  });

  it('should say a tool call was cut off at the length limit', async () => {
    const h = setup([{ content: '{"tool": "post_call", "args": {"post_', finishReason: 'length' }]);

    const { result } = await h.orchestrator.run('show me post 2', new ConversationContext('s1'));

    expect(result.status).toBe('error');
    expect(result.error).toEqual({
      code: 'MALFORMED_INVOCATION',
      message: 'Model output was cut off before the tool call was complete'
    });
    expect(h.post.calls).toEqual([]);
  });

  it('should accept a complete answer that reached the length limit', async () => {
    const h = setup([{ content: POST_2_CALL, finishReason: 'length' }]);

    const { result } = await h.orchestrator.run('show me post 2', new ConversationContext('s1'));

    expect(result.status).toBe('done');
    expect(h.post.calls).toEqual([2]);
  });

  it('should keep the context when phrasing fails after a fetch', async () => {
    const h = setup([POST_2_CALL, new ModelUnavailableError('Ollama API error: timeout')]);
    const context = new ConversationContext('s1');

    const outcome = await h.orchestrator.run('show me post 2', context);

    expect(outcome.result.status).toBe('error');
    expect(outcome.result.toolResult?.status).toBe('ok');
    expect(outcome.context).toBe(context);
    expect(context.lastEntity('post')).toBeUndefined();
  });

  it('should report unexpected failures as internal', async () => {
    const h = setup([new Error('boom')]);

    const { result } = await h.orchestrator.run('hi', new ConversationContext('s1'));

    expect(result.error).toEqual({ code: 'INTERNAL', message: 'boom' });
    expect(result.finalText).toBe('Something went wrong while handling your request.');
  });

  it('should not call the model for an already cancelled turn', async () => {
    const h = setup(['unused']);
    const controller = new AbortController();
    controller.abort();

    const { result } = await h.orchestrator.run('hi', new ConversationContext('s1'), { signal: controller.signal });

    expect(result).toEqual({
      status: 'cancelled',
      finalText: CANCELLED_REPLY,
      error: { code: 'CANCELLED', message: 'Turn cancelled by the caller' }
    });
    expect(h.states).toEqual(['CANCELLED']);
    expect(h.llm.calls).toEqual([]);
  });

  it('should stop before dispatch when cancelled during the model call', async () => {
    const controller = new AbortController();
    const h = setup([
      async () => {
        controller.abort();
        return POST_2_CALL;
      }
    ]);
    const context = new ConversationContext('s1');

    const outcome = await h.orchestrator.run('show me post 2', context, { signal: controller.signal });

    expect(outcome.result.status).toBe('cancelled');
    expect(outcome.context).toBe(context);
    expect(h.post.calls).toEqual([]);
    expect(h.llm.calls[0]?.options.signal).toBe(controller.signal);
  });

  it('should handle only one turn', async () => {
    const h = setup(['one', 'two']);
    await h.orchestrator.run('hi', new ConversationContext('s1'));

    await expect(h.orchestrator.run('again', new ConversationContext('s1'))).rejects.toThrow(
      'A TurnOrchestrator handles exactly one turn'
    );
  });
});
