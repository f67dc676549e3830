/**
 * gnss-toolkit public API
 */

// Coordinates
export { ECEFCoordinate, GeodeticCoordinate } from './types/Coordinates';
export type { DistanceAndBearing, EnuVector, FlatEarthAxes, FlatEarthCoordinate } from './types/Coordinates';
export {
  ecefToEnu,
  ecefToGeodetic,
  enuToEcef,
  enuToGeodetic,
  FlatEarthTransform,
  formatGeodetic,
  geodeticToEcef,
  geodeticToEnu,
  greatCircleDistanceAndBearing,
  haversineDistance,
} from './services/CoordinateTransforms';

// NMEA-0183
export type * from './types/Nmea';
export { computeNmeaChecksum, NmeaStreamParser, parseNmeaSentence } from './services/NmeaParser';
export type { NmeaLineOutcome, NmeaStreamParserOptions, NmeaStreamStats } from './services/NmeaParser';
export { FixAccumulator } from './services/FixAccumulator';
export type { FixUpdate } from './services/FixAccumulator';
export { encodeFixRecord, encodeNmeaSentence, formatGgaSentence } from './services/NmeaEncoder';
export type { EncodableSentenceType } from './services/NmeaEncoder';

// RTCM3
export type * from './types/Rtcm';
export { RtcmDecoder } from './services/RtcmDecoder';
export type { RtcmDecodeOutcome, RtcmDecoderOptions, RtcmDecoderStats } from './services/RtcmDecoder';
export {
  decodeRtcmPayload,
  fullL1Pseudorange,
  isDecodedMessageType,
  legacyMessageType,
  RTCM_DECODERS,
} from './services/RtcmMessages';
export {
  encodeAntennaDescriptor,
  encodeAntennaReferencePoint,
  encodeReceiverAntennaDescriptor,
  encodeGpsEphemeris,
  encodeRtcmFrame,
  encodeRtcmMessage,
  encodeRtkObservables,
} from './services/RtcmEncoder';
export { BitReader, BitWriter } from './utils/bits';
export { crc24q } from './utils/crc24q';

// Correction sources
export { CorrectionSource } from './services/CorrectionSource';
export type { CorrectionMessageCallback, CorrectionSourceStats } from './services/CorrectionSource';
export { CorrectionBroker } from './services/CorrectionBroker';
export type { BrokerMessageEvent, MessageConsumer, ReferenceStation } from './services/CorrectionBroker';
export { backoffDelay, NtripClient } from './sources/NtripClient';
export type { NtripClientOptions } from './sources/NtripClient';
export { parseNtripUri, redactUri } from './sources/NtripConnectionInfo';
export type { NtripConnectionInfo, NtripConnectionState, NtripSession } from './sources/NtripConnectionInfo';
export { connectTcp } from './sources/transport';
export type { Transport, TransportFactory } from './sources/transport';
export { formatReplayLine, ReplaySource } from './sources/ReplaySource';
export type { ReplaySourceOptions } from './sources/ReplaySource';

// Configuration and errors
export { loadConfig } from './config';
export type { AppConfig } from './config';
export * from './utils/errors';
export { createLogger, setLogLevel } from './utils/logger';
export type { LogContext, LogLevel } from './utils/logger';
