/**
 * Public API of the Homeduino client.
 *
 * @module homeduino-client
 */

export { Homeduino, ALL_PROTOCOLS } from './client/homeduino';
export type {
  HomeduinoPhase,
  HomeduinoDeps,
  ConnectOptions,
  RfReceiveCallback,
  PinValueCallback,
  DhtReadCallback
} from './client/homeduino';
export { CallbackRegistry } from './client/callback_registry';
export { LivenessSupervisor } from './client/supervisor';
export type { SupervisorHost, SupervisorChannels, SupervisorOptions } from './client/supervisor';

export { CommandCorrelator } from './command/correlator';
export { RfSendPacer } from './command/rf_send_pacer';
export type { CorrelatorHost, CorrelatorOptions, SendOptions } from './command/command_types';

export { LineFramer } from './protocol/line_framer';
export { LineRouter, classify_line, parse_rf_receive } from './protocol/line_router';
export type { LineRouterHandlers } from './protocol/line_router';
export * from './protocol/command_builder';
export * from './protocol/response_parser';
export { PinMode, DhtType } from './protocol/types';
export type { DhtReading, RfPulses, RoutedLine } from './protocol/types';
export { BAUD_RATES, DEFAULT_BAUD_RATE, DEFAULT_RECEIVE_PIN, DEFAULT_SEND_PIN } from './protocol/constants';
export type { BaudRate } from './protocol/constants';

export { RawPulseCodec, RAW_PROTOCOL, sort_protocols_naturally } from './codec/raw_codec';
export type { RfCodec, RfDecoded, RfValues } from './codec/types';

export { SerialLink } from './transport/serial_link';
export type { ByteLink, LinkFactory, LinkOpenOptions } from './transport/link_types';
export { scan_ports, is_likely_arduino } from './transport/port_scanner';
export type { PortInfo } from './transport/port_scanner';

export { HomeduinoOptionsSchema, parse_options } from './config';
export type { HomeduinoOptions, ResolvedHomeduinoOptions } from './config';
export * from './errors';
export { create_logger, set_log_level, get_log_level } from './log';
export type { Logger, LogLevel } from './log';
