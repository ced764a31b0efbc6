import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as dgram from 'dgram';
import * as osc from 'osc';
import { ControlCommand, ControlServer, parseControlMessage } from '../control/control-server';

describe('parseControlMessage', () => {
  it('parses run with a macro name', () => {
    assert.deepEqual(parseControlMessage('/macro/run', [{ type: 's', value: ' Flip ' }]), { type: 'run', name: 'Flip' });
  });

  it('requires a name for run and a key for hotkey', () => {
    assert.equal(parseControlMessage('/macro/run', []), null);
    assert.equal(parseControlMessage('/hotkey', [{ type: 's', value: '  ' }]), null);
  });

  it('parses stop and hotkey', () => {
    assert.deepEqual(parseControlMessage('/Macro/Stop/', []), { type: 'stop' });
    assert.deepEqual(parseControlMessage('/hotkey', ['F6']), { type: 'hotkey', key: 'F6' });
  });

  it('treats any other address as a trigger', () => {
    assert.deepEqual(parseControlMessage('/Macro/Flip-Reset/', []), { type: 'trigger', address: '/macro/flip-reset' });
  });
});

describe('ControlServer over loopback', () => {
  let server: ControlServer | null = null;
  let client: dgram.Socket | null = null;

  afterEach(() => {
    server?.stop();
    client?.close();
    server = null;
    client = null;
  });

  it('emits parsed commands for incoming OSC messages', async () => {
    const control = new ControlServer({ listenAddress: '127.0.0.1', listenPort: 0 });
    server = control;
    const commands: ControlCommand[] = [];
    const received = new Promise<void>((resolve) => {
      control.on('command', (command: ControlCommand) => {
        commands.push(command);
        if (commands.length === 2) resolve();
      });
    });
    const port = await control.start();
    assert.equal(control.port, port);

    const socket = dgram.createSocket('udp4');
    client = socket;
    socket.send(osc.writeMessage({ address: '/macro/run', args: [{ type: 's', value: 'Flip' }] }), port, '127.0.0.1');
    socket.send(osc.writeMessage({ address: '/macro/stop', args: [] }), port, '127.0.0.1');
    await received;

    assert.deepEqual(commands, [{ type: 'run', name: 'Flip' }, { type: 'stop' }]);
  });
});
