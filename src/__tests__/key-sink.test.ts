import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { LogKeySink, OscKeySink } from '../output/key-sink';
import { OscListener } from '../osc/osc-listener';
import { TypedOscArg } from '../osc/osc-args';
import { resolveKey } from '../keys/key-names';

describe('LogKeySink', () => {
  it('records presses and releases in order', () => {
    const sink = new LogKeySink();
    sink.press(resolveKey('Esc'));
    sink.release(resolveKey('esc'));
    sink.press(resolveKey('F6'));

    assert.deepEqual(
      sink.getEvents().map(e => [e.action, e.key]),
      [['press', 'escape'], ['release', 'escape'], ['press', 'f6']],
    );
  });

  it('keeps only the newest events', () => {
    const sink = new LogKeySink(2);
    sink.press(resolveKey('a'));
    sink.press(resolveKey('b'));
    sink.press(resolveKey('c'));
    assert.deepEqual(sink.getEvents().map(e => e.key), ['b', 'c']);
  });
});

describe('OscKeySink', () => {
  let listener: OscListener | null = null;
  let sink: OscKeySink | null = null;

  afterEach(() => {
    sink?.close();
    listener?.stop();
    sink = null;
    listener = null;
  });

  it('sends /key/press and /key/release with the key name', async () => {
    const rx = new OscListener({ localAddress: '127.0.0.1', localPort: 0 });
    listener = rx;
    const received: Array<[string, unknown]> = [];
    const done = new Promise<void>((resolve) => {
      rx.on('message', (address: string, args: TypedOscArg[]) => {
        received.push([address, args[0]?.value]);
        if (received.length === 2) resolve();
      });
    });
    const port = await rx.start();

    const tx = new OscKeySink({ host: '127.0.0.1', port });
    sink = tx;
    tx.open();
    tx.press(resolveKey('Space'));
    tx.release(resolveKey('space'));
    await done;

    assert.deepEqual(received, [['/key/press', 'space'], ['/key/release', 'space']]);
  });

  it('drops key events while closed', () => {
    const tx = new OscKeySink({ host: '127.0.0.1', port: 9 });
    assert.doesNotThrow(() => tx.press(resolveKey('a')));
  });
});
