/**
 * REPL line handling without a terminal.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { BUSY_MESSAGE, CareCLI, formatAnswer } from '../../src/interfaces/cli.js';
import { CLINotificationSink } from '../../src/interfaces/cli-sink.js';
import { HybridAssistant } from '../../src/agent/hybrid-assistant.js';
import { createLLMError } from '../../src/llm/types.js';
import { CareStore, openCareDatabase } from '../../src/care/store.js';
import { clearMockNow, setMockNow } from '../../src/utils/datetime.js';
import type { AssistantResponse } from '../../src/agent/router/types.js';
import { FakeConnectivity, createFakeCloud, createFakeOnDevice } from '../helpers/fakes.js';

describe('CareCLI', () => {
  let store: CareStore;
  let profileId: string;
  let output: string[];
  let commands: { handle: Mock<(command: string, args: string) => Promise<string | null>> };

  function createCLI(assistant: Pick<HybridAssistant, 'process'>) {
    return new CareCLI({
      assistant,
      store,
      profileId,
      commands,
      timezone: 'UTC',
      output: (text) => output.push(text),
    });
  }

  beforeEach(() => {
    setMockNow(new Date('2026-03-10T09:00:00Z'));
    store = new CareStore(openCareDatabase(':memory:'));
    profileId = store.createProfile({ firstName: 'Ana', lastName: 'Lopez', dateOfBirth: '1946-03-14' }).id;
    output = [];
    commands = {
      handle: vi.fn<(command: string, args: string) => Promise<string | null>>(async (command) =>
        command === 'ayuda' ? 'Comandos' : null
      ),
    };
  });

  afterEach(() => {
    store.close();
    clearMockNow();
  });

  it('ignores blank lines', async () => {
    const onDevice = createFakeOnDevice();
    const cli = createCLI(
      new HybridAssistant({ onDevice, cloud: createFakeCloud(), connectivity: new FakeConnectivity() })
    );

    expect(await cli.handleLine('   ')).toBe('empty');
    expect(onDevice.process).not.toHaveBeenCalled();
    expect(output).toEqual([]);
  });

  it('answers a query and saves both turns', async () => {
    const onDevice = createFakeOnDevice();
    const cli = createCLI(
      new HybridAssistant(
        { onDevice, cloud: createFakeCloud(), connectivity: new FakeConnectivity() },
        { defaultMode: 'hybrid' }
      )
    );

    expect(await cli.handleLine('  hola  ')).toBe('answered');

    const history = store.loadChatHistory(profileId);
    expect(history.map((m) => [m.role, m.content, m.provider])).toEqual([
      ['user', 'hola', null],
      ['assistant', 'local:hola', 'on_device'],
    ]);
    expect(history[1]?.errorMessage).toBeNull();
    expect(history[0]?.isVoiceInput).toBe(false);
    expect(output).toEqual(['\n\x1b[33mAsistente\x1b[0m \x1b[2m(en dispositivo)\x1b[0m: local:hola\n']);
  });

  it('passes the profile snapshot to the assistant', async () => {
    const processQuery = vi.fn<HybridAssistant['process']>(async () => response({ content: 'ok' }));
    await createCLI({ process: processQuery }).handleLine('hola');

    expect(processQuery.mock.calls[0]?.[1]).toMatchObject({ firstName: 'Ana', lastName: 'Lopez', age: 79 });
  });

  it('records the error message when the answer fell back', async () => {
    const cloud = createFakeCloud({ ok: false, error: createLLMError('HTTP 503', 'API_ERROR', 503, true) });
    const cli = createCLI(
      new HybridAssistant(
        { onDevice: createFakeOnDevice(), cloud, connectivity: new FakeConnectivity() },
        { defaultMode: 'hybrid' }
      )
    );

    await cli.handleLine('tengo miedo');

    const [, answer] = store.loadChatHistory(profileId);
    expect(answer).toMatchObject({
      role: 'assistant',
      content: 'local:tengo miedo',
      provider: 'on_device',
      isError: false,
      errorMessage: 'HTTP 503',
    });
  });

  it('ignores input while a query is in flight', async () => {
    let release: (value: AssistantResponse) => void = () => undefined;
    const processQuery = vi.fn<HybridAssistant['process']>(
      () =>
        new Promise<AssistantResponse>((resolve) => {
          release = resolve;
        })
    );
    const cli = createCLI({ process: processQuery });

    const first = cli.handleLine('hola');
    expect(cli.isProcessing()).toBe(true);
    expect(await cli.handleLine('otra pregunta')).toBe('ignored');
    expect(await cli.handleLine('/ayuda')).toBe('ignored');
    expect(output).toEqual([BUSY_MESSAGE, BUSY_MESSAGE]);

    release(response({ content: 'listo' }));
    expect(await first).toBe('answered');
    expect(cli.isProcessing()).toBe(false);
    expect(processQuery).toHaveBeenCalledTimes(1);
    expect(store.countChatMessages(profileId)).toBe(2);
  });

  it('accepts input again after a failure', async () => {
    const processQuery = vi.fn<HybridAssistant['process']>(async () => {
      throw new Error('boom');
    });
    const cli = createCLI({ process: processQuery });

    await expect(cli.handleLine('hola')).rejects.toThrow('boom');
    expect(cli.isProcessing()).toBe(false);
  });

  describe('commands', () => {
    it('delegates to the command handler', async () => {
      const cli = createCLI({ process: vi.fn<HybridAssistant['process']>() });

      expect(await cli.handleLine('/AYUDA')).toBe('command');
      expect(commands.handle).toHaveBeenCalledWith('ayuda', '');
      expect(output).toEqual(['Comandos']);
    });

    it('passes the arguments', async () => {
      const cli = createCLI({ process: vi.fn<HybridAssistant['process']>() });
      await cli.handleLine('/modo  on_device');
      expect(commands.handle).toHaveBeenCalledWith('modo', 'on_device');
    });

    it('reports unknown commands', async () => {
      const cli = createCLI({ process: vi.fn<HybridAssistant['process']>() });
      await cli.handleLine('/bailar');
      expect(output).toEqual(['Comando desconocido: /bailar. Escribe /ayuda.']);
    });

    it('exits on /salir', async () => {
      const cli = createCLI({ process: vi.fn<HybridAssistant['process']>() });
      expect(await cli.handleLine('/salir')).toBe('exit');
      expect(commands.handle).not.toHaveBeenCalled();
    });
  });
});

describe('formatAnswer', () => {
  it('marks fallback answers', () => {
    expect(formatAnswer(response({ content: 'hola', fellBack: true }))).toBe(
      '\x1b[33mAsistente\x1b[0m \x1b[2m(en dispositivo, respaldo)\x1b[0m: hola'
    );
  });
});

describe('CLINotificationSink', () => {
  it('prints reminders with a prefix and redraws the prompt', async () => {
    const lines: string[] = [];
    const afterPrint = vi.fn();
    const sink = new CLINotificationSink({ write: (line) => lines.push(line), afterPrint });

    expect(await sink.send('Hora de tu medicina', { type: 'medication', referenceId: 'm1' })).toBe(true);
    expect(lines).toEqual(['\n\x1b[33m💊\x1b[0m Hora de tu medicina\n']);
    expect(afterPrint).toHaveBeenCalledTimes(1);
  });

  it('does not print while unavailable', async () => {
    const lines: string[] = [];
    const sink = new CLINotificationSink({ write: (line) => lines.push(line) });
    sink.setAvailable(false);

    expect(sink.isAvailable()).toBe(false);
    expect(await sink.send('Cita medica')).toBe(false);
    expect(lines).toEqual([]);
  });
});

function response(overrides: Partial<AssistantResponse>): AssistantResponse {
  return {
    content: '',
    provider: 'on_device',
    processingTimeMs: 3,
    wasPrivacyPreserving: true,
    decision: { provider: 'on_device', reason: 'simple_query', intent: 'simple' },
    fellBack: false,
    ...overrides,
  };
}
