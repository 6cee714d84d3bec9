/**
 * Send Command — Unit Tests
 *
 * Runs the command against an in-process MLLP peer. chalk and ora are
 * replaced so output is plain text and no spinner is drawn.
 */

jest.mock('ora', () => ({
  __esModule: true,
  default: () => {
    const spinner: { text: string; start: () => unknown; stop: () => unknown } = {
      text: '',
      start: () => spinner,
      stop: () => spinner,
    };
    return spinner;
  },
}));

jest.mock('chalk', () => {
  const passthrough = (text: string): string => text;
  return {
    __esModule: true,
    default: Object.assign(passthrough, {
      red: passthrough,
      green: passthrough,
      bold: passthrough,
      gray: passthrough,
      cyan: passthrough,
    }),
  };
});

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { registerSendCommand } from '../../../../src/cli/commands/send.js';
import { ConfigManager } from '../../../../src/cli/lib/ConfigManager.js';
import { MockMllpServer, findClosedPort, mllpBytes } from '../../../helpers/MockMllpServer.js';
import { captureConsole } from '../../../helpers/ConsoleCapture.js';
import { buildTestProgram, run } from '../../../helpers/CliMocks.js';

const ADT_MESSAGE = 'MSH|^~\\&|SendingApp|SendingFac|||202401011230||ADT^A01|MSG123|P|2.5\rPID|1||123456\r';
const ACK = 'MSH|^~\\&|ReceivingApp|ReceivingFac|||202401011231||ACK^A01|ACK123|P|2.5\rMSA|AA|MSG123';

describe('send command', () => {
  let dir: string;
  let messageFile: string;
  let peer: MockMllpServer | null = null;
  let output: ReturnType<typeof captureConsole>;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mllp-send-cmd-'));
    messageFile = path.join(dir, 'adt-a01.hl7');
    fs.writeFileSync(messageFile, ADT_MESSAGE, 'utf8');
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    ConfigManager.reset();
    output = captureConsole();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    await peer?.close();
    peer = null;
  });

  function ackingPeer(): Promise<MockMllpServer> {
    return MockMllpServer.start((socket, server) => {
      server.onFrame(socket, () => socket.write(mllpBytes(ACK)));
    });
  }

  it('should send the file and print the response segments', async () => {
    peer = await ackingPeer();

    await run(buildTestProgram(registerSendCommand), 'send', '-h', '127.0.0.1', '-p', String(peer.port), '-m', messageFile);

    expect(output.stdout()).toEqual([
      'HL7 Message Sent',
      'Response from server:',
      'MSH|^~\\&|ReceivingApp|ReceivingFac|||202401011231||ACK^A01|ACK123|P|2.5\nMSA|AA|MSG123',
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('should send the file content framed and unmodified', async () => {
    peer = await ackingPeer();

    await run(buildTestProgram(registerSendCommand), 'send', '-h', '127.0.0.1', '-p', String(peer.port), '-m', messageFile);

    expect(peer.received[0]).toEqual(mllpBytes(ADT_MESSAGE));
  });

  it('should run as the default command', async () => {
    peer = await ackingPeer();

    await run(buildTestProgram(registerSendCommand), '-p', String(peer.port), '-m', messageFile, '-h', '127.0.0.1');

    expect(output.stdout()[0]).toBe('HL7 Message Sent');
  });

  it('should use the configured host when -h is omitted', async () => {
    peer = await ackingPeer();
    ConfigManager.set('host', '127.0.0.1');

    await run(buildTestProgram(registerSendCommand), 'send', '-p', String(peer.port), '-m', messageFile);

    expect(output.stdout()[0]).toBe('HL7 Message Sent');
  });

  it('should print the result as JSON with --json', async () => {
    peer = await ackingPeer();

    await run(
      buildTestProgram(registerSendCommand),
      '--json',
      'send',
      '-h',
      '127.0.0.1',
      '-p',
      String(peer.port),
      '-m',
      messageFile
    );

    const printed = output.stdout();
    expect(printed).toHaveLength(1);
    expect(JSON.parse(printed[0] ?? '')).toEqual({
      success: true,
      host: '127.0.0.1',
      port: peer.port,
      duration: expect.any(Number),
      response: ACK,
    });
  });

  it('should report a refused connection and set exit code 1', async () => {
    const port = await findClosedPort();

    await run(buildTestProgram(registerSendCommand), 'send', '-h', '127.0.0.1', '-p', String(port), '-m', messageFile);

    expect(output.stdout()).toEqual([]);
    expect(output.stderr()).toHaveLength(1);
    expect(output.stderr()[0]).toMatch(
      new RegExp(`^Failed to send HL7 message: Failed to connect to 127\\.0\\.0\\.1:${port}: `)
    );
    expect(process.exitCode).toBe(1);
  });

  it('should report a timeout when the peer never answers', async () => {
    peer = await MockMllpServer.start(() => {});

    await run(
      buildTestProgram(registerSendCommand),
      'send',
      '-h',
      '127.0.0.1',
      '-p',
      String(peer.port),
      '-m',
      messageFile,
      '-t',
      '1'
    );

    expect(output.stderr()).toEqual(['Failed to send HL7 message: Read timed out']);
    expect(process.exitCode).toBe(1);
  });

  it('should fail before connecting when the message file is missing', async () => {
    peer = await ackingPeer();
    const missing = path.join(dir, 'missing.hl7');

    await run(buildTestProgram(registerSendCommand), 'send', '-h', '127.0.0.1', '-p', String(peer.port), '-m', missing);

    expect(output.stderr()).toEqual([
      `Failed to open message file: ENOENT: no such file or directory, open '${missing}'`,
    ]);
    expect(process.exitCode).toBe(1);
    expect(peer.connectionCount).toBe(0);
  });

  it('should reject a port outside 0-65535', async () => {
    await expect(
      run(buildTestProgram(registerSendCommand), 'send', '-p', '70000', '-m', messageFile)
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('should reject a timeout of zero seconds', async () => {
    await expect(
      run(buildTestProgram(registerSendCommand), 'send', '-p', '6661', '-m', messageFile, '-t', '0')
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('should require the port and the message file', async () => {
    await expect(run(buildTestProgram(registerSendCommand), 'send', '-m', messageFile)).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
    await expect(run(buildTestProgram(registerSendCommand), 'send', '-p', '6661')).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
  });
});
