import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { SessionStateError, TurnBudgetExceeded } from '../src/agent/errors.js';
import { buildSystemPrompt } from '../src/agent/prompt.js';
import { createSession, type AgentHooks } from '../src/agent.js';
import { silentLogger } from '../src/log.js';
import type { ModelClient } from '../src/model.js';
import { Sandbox } from '../src/sandbox.js';
import { registerBuiltinTools } from '../src/tools/builtin.js';
import { ToolExecutor } from '../src/tools/executor.js';
import { ToolRegistry } from '../src/tools/registry.js';
import { INTERRUPTED_RESULT, loadTranscript, saveTranscript } from '../src/transcripts.js';
import type { LatheConfig, LoopState, ToolResult } from '../src/types.js';

import { ScriptedModel, tempWorkspace, testConfig, type RawReply } from './helpers.js';

let root: string;

before(async () => {
  root = await tempWorkspace('agent');
});

after(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function makeSession(model: ModelClient, overrides: Partial<LatheConfig> = {}) {
  const config = testConfig(root, overrides);
  const registry = registerBuiltinTools(new ToolRegistry());
  const executor = new ToolExecutor({ registry, sandbox: Sandbox.fromConfig(config), config, log: silentLogger });
  return createSession({ config, model, registry, executor });
}

function scripted(replies: RawReply[], overrides: Partial<LatheConfig> = {}, streamTokens?: string[]) {
  const model = new ScriptedModel(replies, streamTokens);
  return { model, session: makeSession(model, overrides) };
}

function recorder() {
  const states: LoopState[] = [];
  const tokens: string[] = [];
  const results: ToolResult[] = [];
  const hooks: AgentHooks = {
    onState: (s) => states.push(s),
    onToken: (t) => tokens.push(t),
    onToolResult: (r) => results.push(r),
  };
  return { states, tokens, results, hooks };
}

/** A model that never answers until the turn is cancelled. */
const stalledModel: ModelClient = {
  decide: (_messages, _catalogue, opts) =>
    new Promise((_resolve, reject) => {
      opts.signal?.addEventListener('abort', () => reject(opts.signal?.reason), { once: true });
    }),
  stream: async function* () {
    // no tokens
  },
};

describe('agent loop', () => {
  it('creates a file and finishes in one round', async () => {
    const { session, model } = scripted([
      { calls: [{ name: 'create_file', args: { path: 'notes/todo.txt', content: 'buy milk' } }] },
      { text: 'Done' },
    ]);
    const rec = recorder();
    const outcome = await session.ask('Create notes/todo.txt containing "buy milk"', rec.hooks);

    assert.deepEqual(outcome, { kind: 'done', text: 'Done', rounds: 1, toolCalls: 1 });
    assert.equal(await fs.readFile(path.join(root, 'notes/todo.txt'), 'utf8'), 'buy milk');
    assert.deepEqual(rec.states, ['awaiting_model', 'executing_tools', 'awaiting_model', 'done']);
    assert.deepEqual(rec.tokens, ['Done']);
    assert.equal(session.state, 'done');

    const msgs = session.conversation.snapshot();
    assert.deepEqual(
      msgs.map((m) => m.role),
      ['system', 'user', 'assistant', 'tool', 'assistant']
    );
    assert.deepEqual(msgs[3], { role: 'tool', content: 'created notes/todo.txt (8 bytes)', tool_call_id: 'call_1_0' });
    assert.deepEqual(msgs[4], { role: 'assistant', content: 'Done' });

    assert.deepEqual(
      model.seen[0].map((m) => m.role),
      ['system', 'user']
    );
    assert.ok(model.catalogues[0].some((t) => t.function.name === 'ask_user'));
  });

  it('reports refusals to the model as tool results', async () => {
    const { session } = scripted([
      {
        calls: [
          { name: 'create_file', args: { path: '../escape.txt', content: 'x' } },
          { name: 'frobnicate', args: {} },
          { name: 'run_shell', args: { command: 'sudo rm -rf /' } },
        ],
      },
      { text: 'I could not do that.' },
    ]);
    const rec = recorder();
    const outcome = await session.ask('try things', rec.hooks);
    assert.equal(outcome.kind, 'done');
    assert.deepEqual(
      rec.results.map((r) => [r.ok, r.code]),
      [
        [false, 'blocked'],
        [false, 'unknown_tool'],
        [false, 'blocked'],
      ]
    );
    const tools = session.conversation.snapshot().filter((m) => m.role === 'tool');
    assert.match(tools[0].content, /path escapes workspace root: \.\.\/escape\.txt/);
    assert.match(tools[1].content, /unknown tool: frobnicate/);
    assert.match(tools[2].content, /command blocked \(sudo \(privilege escalation\)\)/);
  });

  it('stops with TurnBudgetExceeded when the model keeps calling tools', async () => {
    const loopCall: RawReply = { calls: [{ name: 'list_dir', args: {} }] };
    const { session, model } = scripted([loopCall, loopCall, loopCall, loopCall], { max_rounds: 3 });
    const outcome = await session.ask('loop forever');
    assert.equal(outcome.kind, 'failed');
    if (outcome.kind !== 'failed') return;
    assert.ok(outcome.error instanceof TurnBudgetExceeded);
    assert.equal(outcome.reason, 'turn budget exceeded: 3 tool rounds used, max_rounds is 3');
    assert.equal(outcome.rounds, 3);
    assert.equal(model.decideCalls, 4);
    assert.equal(session.state, 'failed');
    assert.deepEqual(session.conversation.unansweredCalls(), []);
  });

  it('reports a model failure as a failed turn', async () => {
    const { session } = scripted([]);
    const outcome = await session.ask('hello');
    assert.equal(outcome.kind, 'failed');
    if (outcome.kind !== 'failed') return;
    assert.equal(outcome.reason, 'ScriptedModel: no reply #1');
  });
});

describe('ask_user suspension', () => {
  it('suspends, then resumes with the answer as the tool result', async () => {
    const { session, model } = scripted([
      { calls: [{ name: 'ask_user', args: { question: 'Which file?' } }] },
      { text: 'Thanks' },
    ]);
    const first = await session.ask('edit the file');
    assert.equal(first.kind, 'needs_input');
    if (first.kind !== 'needs_input') return;
    assert.equal(first.question, 'Which file?');
    assert.equal(session.state, 'suspended');
    assert.deepEqual(session.pending, { token: first.token, question: 'Which file?', kind: 'ask' });

    await assert.rejects(() => session.ask('something else'), SessionStateError);
    await assert.rejects(() => session.resume('stale', 'x'), /unknown or stale resume token/);

    const done = await session.resume(first.token, 'notes.txt');
    assert.deepEqual(done, { kind: 'done', text: 'Thanks', rounds: 1, toolCalls: 1 });
    assert.equal(session.pending, undefined);
    assert.deepEqual(model.seen[1].at(-1), { role: 'tool', content: 'notes.txt', tool_call_id: 'call_1_0' });
  });

  it('runs the calls before the question, then the ones after it', async () => {
    const { session } = scripted([
      {
        calls: [
          { name: 'list_dir', args: {} },
          { name: 'ask_user', args: { question: 'Proceed?' } },
          { name: 'create_file', args: { path: 'after.txt', content: 'x' } },
        ],
      },
      { text: 'ok' },
    ]);
    const first = await session.ask('go');
    assert.equal(first.kind, 'needs_input');
    if (first.kind !== 'needs_input') return;
    assert.equal(first.toolCalls, 1);
    await assert.rejects(fs.access(path.join(root, 'after.txt')));

    const done = await session.resume(first.token, 'yes');
    assert.equal(done.kind, 'done');
    assert.equal(done.toolCalls, 3);
    await fs.access(path.join(root, 'after.txt'));
    assert.deepEqual(
      session.conversation.snapshot().flatMap((m) => (m.role === 'tool' ? [m.tool_call_id] : [])),
      ['call_1_0', 'call_1_1', 'call_1_2']
    );
  });

  it('suspends on the question even when read-only calls run in parallel', async () => {
    const { session, model } = scripted(
      [
        {
          calls: [
            { name: 'list_dir', args: {} },
            { name: 'list_dir', args: {} },
            { name: 'ask_user', args: { question: 'Which one?' } },
          ],
        },
        { text: 'ok' },
      ],
      { parallel_read_tools: true }
    );
    const rec = recorder();
    const first = await session.ask('look, then ask', rec.hooks);
    assert.equal(first.kind, 'needs_input');
    if (first.kind !== 'needs_input') return;
    assert.equal(first.question, 'Which one?');
    assert.equal(first.toolCalls, 2);
    assert.deepEqual(rec.results.map((r) => [r.name, r.ok]), [['list_dir', true], ['list_dir', true]]);

    const done = await session.resume(first.token, 'the first');
    assert.equal(done.kind, 'done');
    assert.equal(done.toolCalls, 3);
    assert.deepEqual(model.seen[1].at(-1), { role: 'tool', content: 'the first', tool_call_id: 'call_1_2' });
  });

  it('a transcript saved while a question is pending loads into a working session', async () => {
    const { session } = scripted([{ calls: [{ name: 'ask_user', args: { question: 'Which branch?' } }] }]);
    assert.equal((await session.ask('deploy')).kind, 'needs_input');
    await saveTranscript(session.conversation, 'pending-question', root);

    const next = scripted([{ text: 'Picked main' }]);
    next.session.conversation.replace(await loadTranscript('pending-question', root));
    const outcome = await next.session.ask('use main');
    assert.deepEqual(outcome, { kind: 'done', text: 'Picked main', rounds: 0, toolCalls: 0 });
    assert.deepEqual(next.model.seen[0].slice(-2), [
      { role: 'tool', content: INTERRUPTED_RESULT, tool_call_id: 'call_1_0' },
      { role: 'user', content: 'use main' },
    ]);
  });

  it('cancel drops a pending question and rolls back the round', async () => {
    const { session } = scripted([{ calls: [{ name: 'ask_user', args: { question: 'Sure?' } }] }]);
    await session.ask('do it');
    session.cancel();
    assert.equal(session.state, 'cancelled');
    assert.equal(session.pending, undefined);
    assert.deepEqual(
      session.conversation.snapshot().map((m) => m.role),
      ['system', 'user']
    );
  });
});

describe("confirmation: 'user'", () => {
  it('asks before a confirmed destructive call and runs it on yes', async () => {
    await fs.writeFile(path.join(root, 'trash.txt'), 'x');
    const { session } = scripted(
      [{ calls: [{ name: 'delete_path', args: { path: 'trash.txt', confirm: true } }] }, { text: 'deleted' }],
      { confirmation: 'user' }
    );
    const first = await session.ask('delete trash.txt');
    assert.equal(first.kind, 'needs_input');
    if (first.kind !== 'needs_input') return;
    assert.equal(first.question, 'Approve delete_path: deletes trash.txt? (y/n)');
    assert.equal(session.pending?.kind, 'approval');
    await fs.access(path.join(root, 'trash.txt'));

    const done = await session.resume(first.token, ' Yes ');
    assert.equal(done.kind, 'done');
    await assert.rejects(fs.access(path.join(root, 'trash.txt')));
  });

  it('records a refusal as declined by user', async () => {
    await fs.writeFile(path.join(root, 'keep.txt'), 'x');
    const { session } = scripted(
      [{ calls: [{ name: 'delete_path', args: { path: 'keep.txt', confirm: true } }] }, { text: 'left it' }],
      { confirmation: 'user' }
    );
    const rec = recorder();
    const first = await session.ask('delete keep.txt');
    if (first.kind !== 'needs_input') return assert.fail(`expected needs_input, got ${first.kind}`);
    await session.resume(first.token, 'no', rec.hooks);
    await fs.access(path.join(root, 'keep.txt'));
    assert.equal(rec.results[0].code, 'confirmation_required');
    assert.match(rec.results[0].output, /msg=declined by user/);
  });
});

describe('cancellation', () => {
  it('cancels while waiting on the model', async () => {
    const session = makeSession(stalledModel);
    const pending = session.ask('hang');
    setTimeout(() => session.cancel(), 20);
    const outcome = await pending;
    assert.equal(outcome.kind, 'cancelled');
    assert.equal(session.state, 'cancelled');
    assert.deepEqual(
      session.conversation.snapshot().map((m) => m.role),
      ['system', 'user']
    );
  });

  it('cancels a running tool and drops its round', async () => {
    const { session } = scripted([{ calls: [{ name: 'run_shell', args: { command: 'sleep 30' } }] }]);
    const started = Date.now();
    const pending = session.ask('sleep');
    setTimeout(() => session.cancel(), 200);
    const outcome = await pending;
    assert.equal(outcome.kind, 'cancelled');
    assert.ok(Date.now() - started < 5000);
    assert.deepEqual(session.conversation.unansweredCalls(), []);
    assert.deepEqual(
      session.conversation.snapshot().map((m) => m.role),
      ['system', 'user']
    );
  });

  it('refuses a second ask while one is running', async () => {
    const session = makeSession(stalledModel);
    const pending = session.ask('first');
    await assert.rejects(() => session.ask('second'), /a turn is already running/);
    session.cancel();
    assert.equal((await pending).kind, 'cancelled');
  });
});

describe('streaming final answers', () => {
  it('streams tokens when stream is on', async () => {
    const { session, model } = scripted([{ text: 'draft' }], { stream: true }, ['Hel', 'lo']);
    const rec = recorder();
    const outcome = await session.ask('greet', rec.hooks);
    assert.deepEqual(outcome, { kind: 'done', text: 'Hello', rounds: 0, toolCalls: 0 });
    assert.deepEqual(rec.tokens, ['Hel', 'lo']);
    assert.deepEqual(rec.states, ['awaiting_model', 'streaming', 'done']);
    assert.equal(model.streamed, 1);
  });

  it('falls back to the decided text when the stream is empty', async () => {
    const { session } = scripted([{ text: 'plain' }], { stream: true }, []);
    const rec = recorder();
    const outcome = await session.ask('greet', rec.hooks);
    assert.equal(outcome.kind === 'done' && outcome.text, 'plain');
    assert.deepEqual(rec.tokens, ['plain']);
  });
});

describe('system prompt', () => {
  it('defaults to the built prompt and can be replaced or restored', () => {
    const { session } = scripted([], { confirmation: 'user' });
    const expected = buildSystemPrompt({
      root,
      confirmation: 'user',
      toolNames: registerBuiltinTools(new ToolRegistry()).names(),
    });
    assert.equal(session.conversation.system, expected);
    assert.match(expected, /The user will also be asked to approve each one/);

    session.setSystemPrompt('custom');
    assert.equal(session.conversation.system, 'custom');
    session.setSystemPrompt('');
    assert.equal(session.conversation.system, expected);
  });

  it('config.system_prompt overrides the built prompt', () => {
    const { session } = scripted([], { system_prompt: 'be terse' });
    assert.equal(session.conversation.system, 'be terse');
  });

  it('reset keeps only the system message', async () => {
    const { session } = scripted([{ text: 'hi' }]);
    await session.ask('hello');
    session.reset();
    assert.equal(session.state, 'idle');
    assert.equal(session.conversation.length, 1);
  });
});
