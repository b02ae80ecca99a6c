/**
 * Command Handler
 *
 * Handles /ayuda, /modo, /estado and /historial, and hands care data
 * commands to CareDataCommands. /salir belongs to the CLI.
 */

import { DateTime } from '../utils/datetime.js';
import { createLogger } from '../utils/logger.js';
import { AI_MODES, isAIMode, type AIMode, type ConnectivityCapability, type Provider } from '../agent/router/types.js';
import type { HybridAssistant } from '../agent/hybrid-assistant.js';
import type { CareStore } from '../care/store.js';
import type { ChatMessage } from '../care/types.js';
import type { CommandHandler } from './types.js';
import { CareDataCommands, type CareReminders } from './care-commands.js';

const logger = createLogger('commands');

const HISTORY_LIMIT = 10;

export const PROVIDER_LABELS: Record<Provider, string> = {
  on_device: 'en dispositivo',
  cloud: 'nube',
  hybrid: 'hibrido',
};

export const HELP_TEXT = [
  'Comandos:',
  '  /ayuda              Muestra esta ayuda',
  '  /modo <modo>        Cambia el modo: on_device, cloud o hybrid',
  '  /estado             Conexion, modo y estadisticas',
  '  /historial          Ultimos mensajes',
  '',
  '  /medicamentos       Medicamentos activos y dosis de hoy',
  '  /medicamento <nombre> <dosis> <unidad> [HH:mm,HH:mm]',
  '                      Agrega un medicamento',
  '  /tomar <nombre>     Registra una dosis tomada',
  '  /omitir <nombre> [| motivo]',
  '                      Registra una dosis omitida',
  '  /signos             Ultimas lecturas',
  '  /signo <tipo> <valor>',
  '                      Registra una lectura (presion 120/80, pulso 72, ...)',
  '  /citas              Proximas citas',
  '  /cita <AAAA-MM-DD> <HH:mm> | <titulo> | <doctor> | <lugar>',
  '                      Agrega una cita',
  '  /contactos          Contactos de emergencia',
  '  /contacto <nombre> | <relacion> | <telefono> [| principal]',
  '                      Agrega un contacto',
  '  /emergencia         Contacto principal y notas',
  '',
  '  /salir              Termina la sesion',
].join('\n');

export interface CareCommandDeps {
  store: CareStore;
  profileId: string;
  assistant: Pick<HybridAssistant, 'getStats'>;
  connectivity: ConnectivityCapability;
  defaultMode: AIMode;
  timezone: string;
  reminders?: CareReminders;
}

export class CareCommandHandler implements CommandHandler {
  private deps: CareCommandDeps;
  private careData: CareDataCommands;

  constructor(deps: CareCommandDeps) {
    this.deps = deps;
    this.careData = new CareDataCommands({
      store: deps.store,
      profileId: deps.profileId,
      timezone: deps.timezone,
      reminders: deps.reminders,
    });
  }

  async handle(command: string, args: string): Promise<string | null> {
    switch (command) {
      case 'ayuda':
      case 'help':
        return HELP_TEXT;

      case 'modo':
        return this.handleMode(args.trim());

      case 'estado':
        return this.handleStatus();

      case 'historial':
        return this.handleHistory();

      default:
        return this.careData.handle(command, args);
    }
  }

  currentMode(): AIMode {
    return this.deps.store.getProfile(this.deps.profileId)?.preferredAIMode ?? this.deps.defaultMode;
  }

  private handleMode(arg: string): string {
    if (!arg) {
      return `Modo actual: ${this.currentMode()}. Opciones: ${AI_MODES.join(', ')}.`;
    }

    const mode = arg.toLowerCase();
    if (!isAIMode(mode)) {
      return `Modo no valido: ${arg}. Usa ${AI_MODES.join(', ')}.`;
    }

    this.deps.store.setPreferredAIMode(this.deps.profileId, mode);
    logger.info('mode_changed', { mode });
    return `Modo cambiado a ${mode}.`;
  }

  private handleStatus(): string {
    const stats = this.deps.assistant.getStats();
    const connected = this.deps.connectivity.isConnected();

    return [
      `Conexion: ${connected ? 'en linea' : 'sin conexion'}`,
      `Modo: ${this.currentMode()}`,
      `Consultas: ${stats.totalQueries} (${PROVIDER_LABELS.on_device} ${stats.byProvider.on_device}, ` +
        `${PROVIDER_LABELS.cloud} ${stats.byProvider.cloud}, ${PROVIDER_LABELS.hybrid} ${stats.byProvider.hybrid})`,
      `Respaldos: ${stats.fallbacks}`,
      `Tiempo promedio: ${Math.round(stats.avgProcessingTimeMs)} ms`,
    ].join('\n');
  }

  private handleHistory(): string {
    const messages = this.deps.store.loadChatHistory(this.deps.profileId, HISTORY_LIMIT);
    if (messages.length === 0) {
      return 'No hay mensajes todavia.';
    }
    return messages.map((m) => formatHistoryLine(m, this.deps.timezone)).join('\n');
  }
}

/**
 * "[09:15] Tu: hola" / "[09:15] Asistente (nube): ..."
 */
export function formatHistoryLine(message: ChatMessage, zone: string): string {
  const time = DateTime.fromJSDate(message.createdAt).setZone(zone).toFormat('HH:mm');

  switch (message.role) {
    case 'user':
      return `[${time}] Tu: ${message.content}`;
    case 'assistant': {
      const badge = message.provider ? ` (${PROVIDER_LABELS[message.provider]})` : '';
      return `[${time}] Asistente${badge}: ${message.content}`;
    }
    case 'system':
      return `[${time}] Sistema: ${message.content}`;
  }
}
