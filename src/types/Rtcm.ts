import type { ECEFCoordinate } from './Coordinates';

/**
 * Decoded RTCM3 messages
 */

export type GnssConstellation = 'gps' | 'glonass' | 'galileo' | 'qzss' | 'beidou';

export type MsmLevel = 4 | 5 | 6 | 7;

// =============================================================================
// Reference station
// =============================================================================

/** Types 1005 and 1006 */
export interface AntennaReferencePoint {
  kind: 'antenna-reference-point';
  stationId: number;
  itrfYear: number;
  systems: { gps: boolean; glonass: boolean; galileo: boolean };
  isReferenceStation: boolean;
  singleReceiverOscillator: boolean;
  quarterCycleIndicator: number;
  position: ECEFCoordinate;
  /** Antenna height above the marker in metres, 1006 only */
  antennaHeight?: number;
}

/** Types 1007 and 1008 */
export interface AntennaDescriptor {
  kind: 'antenna-descriptor';
  stationId: number;
  descriptor: string;
  setupId: number;
  /** 1008 only */
  serialNumber?: string;
}

/** Type 1033 */
export interface ReceiverAntennaDescriptor {
  kind: 'receiver-antenna-descriptor';
  stationId: number;
  antennaDescriptor: string;
  antennaSetupId: number;
  antennaSerialNumber: string;
  receiverType: string;
  firmwareVersion: string;
  receiverSerialNumber: string;
}

// =============================================================================
// Multiple signal messages
// =============================================================================

export interface MsmHeader {
  stationId: number;
  /**
   * Epoch time in seconds: time of week for GPS, Galileo, QZSS and BeiDou,
   * time of day for GLONASS
   */
  epochTime: number;
  /** GLONASS only; 0 is Sunday, 7 means unknown */
  dayOfWeek?: number;
  multipleMessage: boolean;
  issueOfDataStation: number;
  clockSteering: number;
  externalClock: number;
  smoothing: boolean;
  smoothingInterval: number;
}

export interface MsmSignal {
  signalId: number;
  /** Metres */
  finePseudorange: number;
  /** Metres */
  finePhaseRange: number;
  lockTimeIndicator: number;
  halfCycleAmbiguity: boolean;
  /** Carrier-to-noise density in dB-Hz */
  cnr: number;
  /** m/s, MSM5 and MSM7 only */
  finePhaseRangeRate?: number;
}

export interface MsmSatellite {
  /** Mask position, e.g. 5 */
  satelliteId: number;
  /** Prefixed id, e.g. `G05` */
  prn: string;
  /** Metres */
  roughRange: number;
  /** MSM5 and MSM7 only */
  extendedInfo?: number;
  /** m/s, MSM5 and MSM7 only */
  roughPhaseRangeRate?: number;
  /** Highest carrier-to-noise density among the satellite's signals */
  cnr: number;
  signals: MsmSignal[];
}

export interface MultipleSignalMessage extends MsmHeader {
  kind: 'msm';
  constellation: GnssConstellation;
  level: MsmLevel;
  satellites: MsmSatellite[];
}

// =============================================================================
// Legacy RTK observables
// =============================================================================

export interface LegacySignal {
  /**
   * L1: 0 C/A, 1 P(Y). L2: 0 C/A or L2C, 1 P(Y) direct, 2 P(Y) cross-correlated,
   * 3 correlated P(Y)
   */
  codeIndicator: number;
  /**
   * Metres. On L1 the pseudorange modulo the ambiguity unit; on L2 the
   * difference to L1. Undefined when the caster flags it invalid.
   */
  pseudorange?: number;
  /** Phase range minus L1 pseudorange in metres, undefined when invalid */
  phaseRangeDifference?: number;
  lockTimeIndicator: number;
  /** dB-Hz, extended messages only */
  cnr?: number;
}

export interface LegacySatellite {
  satelliteId: number;
  /** Prefixed id, e.g. `G05` or `R12` */
  prn: string;
  /** GLONASS frequency channel number, -7 to 13 */
  frequencyChannel?: number;
  /**
   * Whole light-milliseconds (GLONASS: units of 2 ms) to add to the L1
   * pseudorange, extended messages only
   */
  ambiguity?: number;
  l1: LegacySignal;
  /** 1003, 1004, 1011 and 1012 only */
  l2?: LegacySignal;
}

/** Types 1001 to 1004 (GPS) and 1009 to 1012 (GLONASS) */
export interface RtkObservables {
  kind: 'rtk-observables';
  constellation: 'gps' | 'glonass';
  stationId: number;
  /** Seconds; GPS time of week, or GLONASS time of day */
  epochTime: number;
  /** More observables for the same epoch follow */
  synchronous: boolean;
  smoothing: boolean;
  smoothingInterval: number;
  /** Carries L2 fields */
  dualFrequency: boolean;
  /** Carries ambiguities and carrier-to-noise densities */
  extended: boolean;
  satellites: LegacySatellite[];
}

// =============================================================================
// GPS ephemeris
// =============================================================================

/** Type 1019. Angles in radians, times in seconds */
export interface GpsEphemeris {
  kind: 'gps-ephemeris';
  satelliteId: number;
  prn: string;
  /** GPS week number modulo 1024 */
  week: number;
  /** User range accuracy index */
  uraIndex: number;
  codeOnL2: number;
  /** rad/s */
  iDot: number;
  iode: number;
  toc: number;
  /** s/s² */
  af2: number;
  /** s/s */
  af1: number;
  af0: number;
  iodc: number;
  /** Metres */
  crs: number;
  /** rad/s */
  deltaN: number;
  m0: number;
  cuc: number;
  eccentricity: number;
  cus: number;
  /** √m */
  sqrtA: number;
  toe: number;
  cic: number;
  omega0: number;
  cis: number;
  i0: number;
  /** Metres */
  crc: number;
  omega: number;
  /** rad/s */
  omegaDot: number;
  tgd: number;
  health: number;
  l2PDataFlag: boolean;
  /** Curve fit interval longer than 4 hours */
  extendedFitInterval: boolean;
}

// =============================================================================
// GLONASS biases
// =============================================================================

/** Type 1230 */
export interface GlonassCodePhaseBiases {
  kind: 'glonass-biases';
  stationId: number;
  aligned: boolean;
  /** Metres, present per signal flagged in the message mask */
  biases: { l1ca?: number; l1p?: number; l2ca?: number; l2p?: number };
}

// =============================================================================
// Message envelope
// =============================================================================

export interface OpaquePayload {
  kind: 'opaque';
  /** Full payload including the message type bits */
  payload: Uint8Array;
}

export type RtcmBody =
  | AntennaReferencePoint
  | AntennaDescriptor
  | ReceiverAntennaDescriptor
  | MultipleSignalMessage
  | RtkObservables
  | GpsEphemeris
  | GlonassCodePhaseBiases
  | OpaquePayload;

export interface RtcmMessage {
  messageType: number;
  /** Payload length in bits */
  bitLength: number;
  body: RtcmBody;
}
