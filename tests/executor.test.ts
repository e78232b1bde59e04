import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import { after, before, describe, it } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';

import { silentLogger } from '../src/log.js';
import { Sandbox } from '../src/sandbox.js';
import { argInt, argStr } from '../src/tools/args.js';
import { ToolExecutor } from '../src/tools/executor.js';
import { ToolRegistry } from '../src/tools/registry.js';
import { bool, confirmFlag, int, obj, str } from '../src/tools/schema.js';
import type { LatheConfig, ToolCall } from '../src/types.js';

import { tempWorkspace, testConfig } from './helpers.js';

const call = (name: string, args: Record<string, unknown> | string = {}, id = `c_${name}`): ToolCall => ({
  id,
  name,
  arguments: typeof args === 'string' ? args : JSON.stringify(args),
});

describe('ToolExecutor', () => {
  let root: string;
  let ran: string[];
  let finished: number[];

  before(async () => {
    root = await tempWorkspace('executor');
  });

  after(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function setup(overrides: Partial<LatheConfig> = {}) {
    ran = [];
    finished = [];
    const registry = new ToolRegistry()
      .register(
        { name: 'echo', description: 'Echo text.', readOnly: true, parameters: obj({ text: str('Text') }, ['text']) },
        async (args) => {
          ran.push('echo');
          return argStr(args, 'text');
        }
      )
      .register(
        {
          name: 'wipe',
          description: 'Wipe a target.',
          parameters: obj({ target: str('Target'), confirm: confirmFlag() }, ['target']),
          destructive: (args) => `wipes ${String(args.target)}`,
        },
        async (args) => {
          ran.push('wipe');
          return `wiped ${argStr(args, 'target')}`;
        }
      )
      .register(
        {
          name: 'slow',
          description: 'Wait, then report.',
          readOnly: true,
          parameters: obj({ ms: int('Delay', { min: 0 }), tag: int('Tag') }, ['ms', 'tag']),
        },
        async (args) => {
          await delay(argInt(args, 'ms', 0));
          finished.push(argInt(args, 'tag', 0));
          return `slept ${argInt(args, 'ms', 0)}`;
        }
      )
      .register(
        { name: 'big', description: 'Large output.', readOnly: true, parameters: obj({ loud: bool('Loud') }) },
        async () => 'x'.repeat(120)
      )
      .register({ name: 'boom', description: 'Always fails.', parameters: obj({}) }, async () => {
        throw new Error('disk exploded');
      })
      .registerUserInput({
        name: 'ask_user',
        description: 'Ask.',
        readOnly: true,
        parameters: obj({ question: str() }, ['question']),
      });

    const config = testConfig(root, overrides);
    return new ToolExecutor({ registry, sandbox: new Sandbox({ root }), config, log: silentLogger });
  }

  it('runs a handler and reports ok', async () => {
    const ex = setup();
    assert.deepEqual(await ex.execute(call('echo', { text: 'hi' }, 'c1')), {
      toolCallId: 'c1',
      name: 'echo',
      output: 'hi',
      ok: true,
    });
  });

  it('reports an unknown tool without throwing', async () => {
    const r = await setup().execute(call('frobnicate'));
    assert.equal(r.ok, false);
    assert.equal(r.code, 'unknown_tool');
    assert.match(r.output, /^ERROR: code=unknown_tool retryable=false\nmsg=unknown tool: frobnicate\nhint=available tools: echo, wipe/);
  });

  it('validates arguments before the handler runs', async () => {
    const ex = setup();
    const r = await ex.execute(call('echo', {}));
    assert.equal(r.code, 'invalid_args');
    assert.equal(
      r.output,
      'ERROR: code=invalid_args retryable=false\n- text: missing required field\nhint=fix the listed fields and call the tool again'
    );
    assert.deepEqual(ran, []);
  });

  it('reports malformed JSON arguments', async () => {
    const r = await setup().execute(call('echo', '{"text": '));
    assert.equal(r.code, 'invalid_args');
    assert.match(r.output, /- arguments: not valid JSON/);
  });

  it('maps a thrown Error to an internal failure', async () => {
    const r = await setup().execute(call('boom'));
    assert.equal(r.output, 'ERROR: code=internal retryable=false\nmsg=disk exploded');
  });

  it('refuses to execute a user-input binding', async () => {
    const r = await setup().execute(call('ask_user', { question: 'why?' }));
    assert.equal(r.code, 'invalid_args');
    assert.match(r.output, /ask_user is answered by the user and cannot be executed directly/);
  });

  it('reports cancellation when the signal is already aborted', async () => {
    const ac = new AbortController();
    ac.abort();
    const r = await setup().execute(call('echo', { text: 'x' }), { signal: ac.signal });
    assert.equal(r.code, 'cancelled');
    assert.deepEqual(ran, []);
  });

  it('caps the result at max_result_chars', async () => {
    const r = await setup({ max_result_chars: 50 }).execute(call('big'));
    assert.equal(r.output, 'x'.repeat(50) + '\n...[truncated, 120 chars total]');
  });

  describe('confirmation gate', () => {
    it('needs confirm=true for a destructive call', async () => {
      const ex = setup();
      const r = await ex.execute(call('wipe', { target: 'db' }));
      assert.equal(r.code, 'confirmation_required');
      assert.match(r.output, /msg=wipe is destructive \(wipes db\) and was called without confirm=true/);
      assert.deepEqual(ran, []);

      const ok = await ex.execute(call('wipe', { target: 'db', confirm: true }));
      assert.equal(ok.output, 'wiped db');
    });

    it("under 'user' policy also needs out-of-band approval", async () => {
      const ex = setup({ confirmation: 'user' });
      const c = call('wipe', { target: 'db', confirm: true });
      assert.equal(await ex.approvalQuestion(c), 'Approve wipe: wipes db? (y/n)');

      const refused = await ex.execute(c);
      assert.equal(refused.code, 'confirmation_required');
      assert.match(refused.output, /wipe needs the user's approval \(wipes db\)/);

      assert.equal((await ex.execute(c, { approved: true })).ok, true);
      assert.deepEqual(ran, ['wipe']);
    });

    it('asks nothing for safe, unconfirmed or invalid calls', async () => {
      const ex = setup({ confirmation: 'user' });
      assert.equal(await ex.approvalQuestion(call('echo', { text: 'a' })), undefined);
      assert.equal(await ex.approvalQuestion(call('wipe', { target: 'db' })), undefined);
      assert.equal(await ex.approvalQuestion(call('nope')), undefined);
      assert.equal(await setup().approvalQuestion(call('wipe', { target: 'db', confirm: true })), undefined);
    });
  });

  describe('batching', () => {
    it('groups consecutive read-only calls only when parallel_read_tools is on', () => {
      const calls = [call('echo'), call('big'), call('wipe'), call('echo')];
      const parallel = setup({ parallel_read_tools: true });
      const sizes = (ex: ToolExecutor) => [0, 2, 3].map((i) => ex.nextGroup(calls, i).length);
      assert.deepEqual(sizes(setup({ parallel_read_tools: true })), [2, 1, 1]);
      assert.deepEqual(sizes(setup()), [1, 1, 1]);
    });

    it('never pulls a user-answered tool into a group', () => {
      const ex = setup({ parallel_read_tools: true });
      const calls = [call('echo'), call('ask_user'), call('echo')];
      assert.deepEqual(ex.nextGroup(calls, 0).map((c) => c.name), ['echo']);
      assert.deepEqual(ex.nextGroup(calls, 1).map((c) => c.name), ['ask_user']);
    });

    it('returns results in issue order even when a group overlaps', async () => {
      const ex = setup({ parallel_read_tools: true });
      const calls = [call('slow', { ms: 80, tag: 1 }, 'a'), call('slow', { ms: 5, tag: 2 }, 'b')];
      const group = ex.nextGroup(calls, 0);
      assert.equal(group.length, 2);
      const results = await ex.executeGroup(group);
      assert.deepEqual(results.map((r) => r.toolCallId), ['a', 'b']);
      assert.deepEqual(finished, [2, 1]);
    });
  });
});
