import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SurfaceGoneError } from '../src/errors.js';
import type { CommandResult, CommandRunner } from '../src/host/exec.js';
import { TmuxHost, escapeTrailingSemicolon } from '../src/host/tmux.js';
import { flush } from './helpers/fake-host.js';

type Reply = Partial<CommandResult> | Promise<Partial<CommandResult>>;

function scripted(respond: (argv: string[]) => Reply = () => ({})) {
  const calls: string[][] = [];
  const runner: CommandRunner = async (file, args) => {
    const argv = [file, ...args];
    calls.push(argv);
    const reply = await respond(argv);
    return { stdout: '', stderr: '', code: 0, ...reply };
  };
  return { runner, calls };
}

function deferred(): { promise: Promise<Partial<CommandResult>>; resolve: (r: Partial<CommandResult>) => void } {
  let resolve: (r: Partial<CommandResult>) => void = () => {};
  const promise = new Promise<Partial<CommandResult>>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const editor = { filePath: '/work/app/main.go', cursorLine: 3, cwd: '/work/app' };

describe('TmuxHost', () => {
  it('list-panesの出力をサーフェス一覧にする', async () => {
    const { runner, calls } = scripted(() => ({ stdout: '%0\t1234\t0\n%3\t5678\t1\n%4\t\t0\n' }));
    const host = new TmuxHost({ editor, runner });

    assert.deepEqual(await host.listSurfaces(), [
      { id: '%0', pid: 1234, dead: false },
      { id: '%3', pid: 5678, dead: true },
      { id: '%4', pid: null, dead: false },
    ]);
    assert.deepEqual(calls, [['tmux', 'list-panes', '-a', '-F', '#{pane_id}\t#{pane_pid}\t#{pane_dead}']]);
  });

  it('tmuxサーバーがなければサーフェスは空', async () => {
    const { runner } = scripted(() => ({ code: 1, stderr: 'no server running' }));
    assert.deepEqual(await new TmuxHost({ editor, runner }).listSurfaces(), []);
  });

  it('psでプロセス名を取得する', async () => {
    const { runner, calls } = scripted(() => ({ stdout: 'cursor\n' }));
    assert.equal(await new TmuxHost({ editor, runner }).processName(1234), 'cursor');
    assert.deepEqual(calls, [['ps', '-p', '1234', '-o', 'comm=']]);
  });

  it('消えたプロセスの名前はnull', async () => {
    const { runner } = scripted(() => ({ code: 1 }));
    assert.equal(await new TmuxHost({ editor, runner }).processName(1234), null);
  });

  it('エディタのcwdで右側にペインを作る', async () => {
    const { runner, calls } = scripted(() => ({ stdout: '%7\n' }));
    assert.equal(await new TmuxHost({ editor, runner }).createSurface(), '%7');
    assert.deepEqual(calls, [['tmux', 'split-window', '-h', '-f', '-P', '-F', '#{pane_id}', '-c', '/work/app']]);
  });

  it('ペイン作成の失敗はエラーになる', async () => {
    const { runner } = scripted(() => ({ code: 1, stderr: 'no space for new pane\n' }));
    await assert.rejects(
      new TmuxHost({ editor, runner }).createSurface(),
      /tmux split-window failed: no space for new pane/,
    );
  });

  it('エージェントを起動し、終了通知でonExitを呼ぶ', async () => {
    const exit = deferred();
    const { runner, calls } = scripted((argv) => {
      if (argv[1] === 'display-message') return { stdout: '4321\n' };
      if (argv[1] === 'wait-for') return exit.promise;
      return {};
    });
    const exited: number[] = [];
    const host = new TmuxHost({ editor, runner, pollIntervalMs: 60_000 });

    const pid = await host.spawn('%7', ['cursor', 'agent'], { onExit: (p) => exited.push(p) });
    assert.equal(pid, 4321);

    const hook = calls[1]?.[6] ?? '';
    const match = hook.match(/^wait-for -S (agentline-exit-7-[0-9a-f]{8}) ; kill-pane -t %7$/);
    assert.ok(match, hook);
    const channel = match[1] ?? '';
    assert.deepEqual(calls, [
      ['tmux', 'set-option', '-p', '-t', '%7', 'remain-on-exit', 'on'],
      ['tmux', 'set-hook', '-p', '-t', '%7', 'pane-died', hook],
      ['tmux', 'respawn-pane', '-k', '-t', '%7', 'cursor', 'agent'],
      ['tmux', 'display-message', '-p', '-t', '%7', '#{pane_pid}'],
      ['tmux', 'wait-for', channel],
    ]);

    await flush();
    assert.deepEqual(exited, []);
    exit.resolve({});
    await flush();
    assert.deepEqual(exited, [4321]);
  });

  it('pane-diedなしでペインが消えても終了を通知する', async () => {
    const exit = deferred();
    const { runner, calls } = scripted((argv) => {
      if (argv[1] === 'display-message') {
        return argv[5] === '#{pane_pid}' ? { stdout: '4321\n' } : { code: 1, stderr: "can't find pane: %7" };
      }
      if (argv[1] === 'wait-for' && argv[2] === '-S') {
        exit.resolve({});
        return {};
      }
      if (argv[1] === 'wait-for') return exit.promise;
      return {};
    });
    let notify: (pid: number) => void = () => {};
    const exited = new Promise<number>((resolve) => {
      notify = resolve;
    });

    await new TmuxHost({ editor, runner, pollIntervalMs: 1 }).spawn('%7', ['cursor', 'agent'], {
      onExit: (p) => notify(p),
    });
    assert.equal(await exited, 4321);

    const channel = calls.find((c) => c[1] === 'wait-for')?.[2] ?? '';
    assert.match(channel, /^agentline-exit-7-[0-9a-f]{8}$/);
    assert.deepEqual(
      calls.filter((c) => c[5] === '#{pane_id}'),
      [['tmux', 'display-message', '-p', '-t', '%7', '#{pane_id}']],
    );
    assert.deepEqual(calls.at(-1), ['tmux', 'wait-for', '-S', channel]);
  });

  it('ペインが生きている間は監視を続ける', async () => {
    const exit = deferred();
    let polls = 0;
    const { runner } = scripted((argv) => {
      if (argv[1] === 'display-message' && argv[5] === '#{pane_pid}') return { stdout: '4321\n' };
      if (argv[1] === 'display-message') {
        polls += 1;
        return polls < 3 ? { stdout: '%7\n' } : { code: 1 };
      }
      if (argv[1] === 'wait-for' && argv[2] === '-S') {
        exit.resolve({});
        return {};
      }
      if (argv[1] === 'wait-for') return exit.promise;
      return {};
    });
    let notify: (pid: number) => void = () => {};
    const exited = new Promise<number>((resolve) => {
      notify = resolve;
    });

    await new TmuxHost({ editor, runner, pollIntervalMs: 1 }).spawn('%7', ['cursor'], { onExit: (p) => notify(p) });
    assert.equal(await exited, 4321);
    assert.equal(polls, 3);
  });

  it('起動コマンドの失敗はエラーになる', async () => {
    const { runner } = scripted((argv) => (argv[1] === 'respawn-pane' ? { code: 1, stderr: 'bad command' } : {}));
    await assert.rejects(
      new TmuxHost({ editor, runner }).spawn('%7', ['cursor', 'agent'], { onExit: () => {} }),
      /Failed to start cursor agent: bad command/,
    );
  });

  it('改行で終わるテキストは本文とEnterに分けて送る', async () => {
    const { runner, calls } = scripted();
    await new TmuxHost({ editor, runner }).send('%7', '-v @main.go:3\n');
    assert.deepEqual(calls, [
      ['tmux', 'send-keys', '-t', '%7', '-l', '--', '-v @main.go:3'],
      ['tmux', 'send-keys', '-t', '%7', 'Enter'],
    ]);
  });

  it('末尾のセミコロンはtmuxの区切りと解釈されないようエスケープする', async () => {
    const { runner, calls } = scripted();
    await new TmuxHost({ editor, runner }).send('%7', 'explain this;\n');
    assert.deepEqual(calls, [
      ['tmux', 'send-keys', '-t', '%7', '-l', '--', 'explain this\\;'],
      ['tmux', 'send-keys', '-t', '%7', 'Enter'],
    ]);
  });

  it('セミコロンが末尾にあるときだけエスケープする', () => {
    assert.equal(escapeTrailingSemicolon('a; b'), 'a; b');
    assert.equal(escapeTrailingSemicolon('a\\;'), 'a\\\\;');
    assert.equal(escapeTrailingSemicolon(';'), '\\;');
  });

  it('消えたペインへの送信はSurfaceGoneError', async () => {
    const { runner } = scripted(() => ({ code: 1, stderr: "can't find pane: %7" }));
    await assert.rejects(new TmuxHost({ editor, runner }).send('%7', 'hi\n'), SurfaceGoneError);
  });

  it('pane_deadでプロセスの生存を判定する', async () => {
    const replies: Partial<CommandResult>[] = [{ stdout: '0\n' }, { stdout: '1\n' }, { code: 1 }];
    const { runner } = scripted(() => replies.shift() ?? {});
    const host = new TmuxHost({ editor, runner });
    assert.equal(await host.isAttached('%7'), true);
    assert.equal(await host.isAttached('%7'), false);
    assert.equal(await host.isAttached('%7'), false);
  });

  it('コピーモード中なら抜けて入力を受け付ける', async () => {
    const { runner, calls } = scripted((argv) => (argv[1] === 'display-message' ? { stdout: '1\n' } : {}));
    await new TmuxHost({ editor, runner }).requestInput('%7');
    assert.deepEqual(calls[1], ['tmux', 'send-keys', '-t', '%7', '-X', 'cancel']);
  });

  it('通常モードなら何も送らない', async () => {
    const { runner, calls } = scripted(() => ({ stdout: '0\n' }));
    await new TmuxHost({ editor, runner }).requestInput('%7');
    assert.equal(calls.length, 1);
  });

  it('ウィンドウとペインを選択してフォーカスする', async () => {
    const { runner, calls } = scripted();
    await new TmuxHost({ editor, runner }).focus('%7');
    assert.deepEqual(calls, [
      ['tmux', 'select-window', '-t', '%7'],
      ['tmux', 'select-pane', '-t', '%7'],
    ]);
  });

  it('既に消えたペインの破棄はエラーにしない', async () => {
    const { runner, calls } = scripted(() => ({ code: 1 }));
    await new TmuxHost({ editor, runner }).destroySurface('%7');
    assert.deepEqual(calls, [['tmux', 'kill-pane', '-t', '%7']]);
  });

  it('フォーカス通知ごとにリスナーを呼び、dispose後は止まる', async () => {
    const waits: Array<ReturnType<typeof deferred>> = [];
    const { runner, calls } = scripted((argv) => {
      if (argv[1] === 'wait-for' && argv[2] !== '-S') {
        const wait = deferred();
        waits.push(wait);
        return wait.promise;
      }
      return {};
    });
    let focused = 0;
    const observer = new TmuxHost({ editor, runner }).onFocusGained('%7', () => {
      focused += 1;
    });

    await flush();
    waits[0]?.resolve({});
    await flush();
    assert.equal(focused, 1);
    assert.equal(waits.length, 2);

    observer.dispose();
    const channel = calls[1]?.[2] ?? '';
    assert.match(channel, /^agentline-focus-7-[0-9a-f]{8}$/);
    assert.deepEqual(calls.at(-1), ['tmux', 'wait-for', '-S', channel]);

    waits[1]?.resolve({});
    await flush();
    assert.equal(focused, 1);
    assert.equal(waits.length, 2);
  });

  it('エディタ状態と選択範囲をそのまま返す', () => {
    const host = new TmuxHost({ editor, selection: { anchor: 9, cursor: 4 } });
    assert.deepEqual(host.editorState(), editor);
    assert.deepEqual(host.selectionAnchors(), { anchor: 9, cursor: 4 });
    assert.equal(new TmuxHost({ editor }).selectionAnchors(), null);
  });
});
