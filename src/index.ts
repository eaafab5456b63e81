/**
 * Command Sequence Engine
 *
 * Parses, expands, validates and executes device command sequences:
 *   wait <seconds>               sleep, cancellable
 *   if / else / endif            conditional blocks over named flags
 *   stop_if_not <expr>           stop the run when the condition is false
 *   sequence <name>, <name>      nested sequence references
 *   button <name>                button macro substitution
 *   og_multizone-<command>       fan out over the active zones
 *   multizone <params>           raw zone mask command
 *
 * Usage:
 *   const device = new DeviceEmulator();
 *   const manager = new SequenceManager({ transport: device.createTransport() });
 *   manager.addSequence('intro', ['power on', 'wait 2', 'volume 5']);
 *   const outcome = await manager.execute('intro');
 */

export * from './sequences';
export * from './execution';
export type { ZoneStatus, ZoneState, ZoneSelection, DispatchResult, CommandDispatcher, FanOutResult } from './zones/types';
export { ZONE_IDS } from './zones/types';
export { ZoneManager, zoneMaskCommand, maskToZones } from './zones/zone-manager';
export type { CacheStats } from './cache/result-cache';
export { ResultCache } from './cache/result-cache';
export type { FlagSource } from './flags/flag-store';
export { FlagStore } from './flags/flag-store';
export type { EmulatorLogEntry, EmulatorReply, DeviceEmulatorOptions } from './emulators/device-emulator';
export { DeviceEmulator } from './emulators/device-emulator';
export type { EngineErrorKind } from './errors';
export {
  SequenceEngineError,
  CommandSyntaxError,
  CommandRangeError,
  SequenceTimeoutError,
  StructuralError,
  TransportError,
  CancelledError,
  createEngineError,
  isEngineError,
  errorMessage,
} from './errors';
export type { EngineConfig, EngineConfigInput, ParserLimits, ExecutionConfig, ResponseKeywords, NestedIfPolicy } from './config-schema';
export { engineConfigSchema, validateEngineConfig, formatZodError } from './config-schema';
export { DEFAULT_CONFIG_FILE, defaultEngineConfig, parseEngineConfigYaml, loadEngineConfig } from './config';
export type { LogLevel, LoggerConfig } from './logger';
export { initLogger, getLogger, getRootLogger, setLogLevel } from './logger';
