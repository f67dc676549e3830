import { BitReader } from '../utils/bits';
import { ECEFCoordinate } from '../types/Coordinates';
import type {
  AntennaDescriptor,
  AntennaReferencePoint,
  GlonassCodePhaseBiases,
  GnssConstellation,
  GpsEphemeris,
  LegacySatellite,
  LegacySignal,
  MsmLevel,
  MsmSatellite,
  MsmSignal,
  MultipleSignalMessage,
  ReceiverAntennaDescriptor,
  RtcmBody,
  RtcmMessage,
  RtkObservables,
} from '../types/Rtcm';

/**
 * RTCM3 payload decoders, keyed by message type
 *
 * Adding a message type means adding a body variant in types/Rtcm.ts and a
 * registry entry here.
 */

export const MESSAGE_TYPE_BITS = 12;

/** Reference station coordinates and antenna height are in 0.1 mm */
export const ANTENNA_UNITS_PER_METRE = 10000;

/** Metres travelled by light in one millisecond */
export const RANGE_UNIT_MSM = 299792.458;

const GLONASS_BIAS_RESOLUTION = 0.02;

/** GLONASS epochs carry the day of week above a 27-bit time of day */
const GLONASS_TIME_OF_DAY_RANGE = 2 ** 27;

export type BodyDecoder = (reader: BitReader, messageType: number) => RtcmBody;

// =============================================================================
// Reference station and antenna
// =============================================================================

function readPositionAxis(reader: BitReader): number {
  // Divided rather than scaled so that whole 0.1 mm values stay exact decimals
  return reader.readSigned(38) / ANTENNA_UNITS_PER_METRE;
}

const decodeAntennaReferencePoint: BodyDecoder = (reader, messageType) => {
  const stationId = reader.readUnsigned(12);
  const itrfYear = reader.readUnsigned(6);
  const systems = { gps: reader.readBool(), glonass: reader.readBool(), galileo: reader.readBool() };
  const isReferenceStation = reader.readBool();
  const x = readPositionAxis(reader);
  const singleReceiverOscillator = reader.readBool();
  reader.skip(1);
  const y = readPositionAxis(reader);
  const quarterCycleIndicator = reader.readUnsigned(2);
  const z = readPositionAxis(reader);

  const body: AntennaReferencePoint = {
    kind: 'antenna-reference-point',
    stationId,
    itrfYear,
    systems,
    isReferenceStation,
    singleReceiverOscillator,
    quarterCycleIndicator,
    position: new ECEFCoordinate(x, y, z),
  };

  if (messageType === 1006) {
    body.antennaHeight = reader.readUnsigned(16) / ANTENNA_UNITS_PER_METRE;
  }
  return body;
};

/** uint8 character count followed by that many 8-bit characters */
function readCountedString(reader: BitReader): string {
  return reader.readString(reader.readUnsigned(8));
}

const decodeAntennaDescriptor: BodyDecoder = (reader, messageType) => {
  const body: AntennaDescriptor = {
    kind: 'antenna-descriptor',
    stationId: reader.readUnsigned(12),
    descriptor: readCountedString(reader),
    setupId: reader.readUnsigned(8),
  };

  if (messageType === 1008) {
    body.serialNumber = readCountedString(reader);
  }
  return body;
};

const decodeReceiverAntennaDescriptor: BodyDecoder = reader => {
  const body: ReceiverAntennaDescriptor = {
    kind: 'receiver-antenna-descriptor',
    stationId: reader.readUnsigned(12),
    antennaDescriptor: readCountedString(reader),
    antennaSetupId: reader.readUnsigned(8),
    antennaSerialNumber: readCountedString(reader),
    receiverType: readCountedString(reader),
    firmwareVersion: readCountedString(reader),
    receiverSerialNumber: readCountedString(reader),
  };
  return body;
};

// =============================================================================
// Multiple signal messages
// =============================================================================

interface MsmFieldLayout {
  pseudorangeBits: number;
  pseudorangeScale: number;
  phaseRangeBits: number;
  phaseRangeScale: number;
  lockTimeBits: number;
  cnrBits: number;
  cnrScale: number;
  hasRates: boolean;
}

const STANDARD_RESOLUTION = {
  pseudorangeBits: 15,
  pseudorangeScale: 2 ** -24,
  phaseRangeBits: 22,
  phaseRangeScale: 2 ** -29,
  lockTimeBits: 4,
  cnrBits: 6,
  cnrScale: 1,
};

const HIGH_RESOLUTION = {
  pseudorangeBits: 20,
  pseudorangeScale: 2 ** -29,
  phaseRangeBits: 24,
  phaseRangeScale: 2 ** -31,
  lockTimeBits: 10,
  cnrBits: 10,
  cnrScale: 0.0625,
};

const MSM_LAYOUTS: Readonly<Record<MsmLevel, MsmFieldLayout>> = {
  4: { ...STANDARD_RESOLUTION, hasRates: false },
  5: { ...STANDARD_RESOLUTION, hasRates: true },
  6: { ...HIGH_RESOLUTION, hasRates: false },
  7: { ...HIGH_RESOLUTION, hasRates: true },
};

const MSM_CONSTELLATIONS: ReadonlyArray<{ base: number; constellation: GnssConstellation; prefix: string }> = [
  { base: 1070, constellation: 'gps', prefix: 'G' },
  { base: 1080, constellation: 'glonass', prefix: 'R' },
  { base: 1090, constellation: 'galileo', prefix: 'E' },
  { base: 1110, constellation: 'qzss', prefix: 'J' },
  { base: 1120, constellation: 'beidou', prefix: 'C' },
];

const MSM_LEVELS: readonly MsmLevel[] = [4, 5, 6, 7];

function createMsmDecoder(constellation: GnssConstellation, prefix: string, level: MsmLevel): BodyDecoder {
  const layout = MSM_LAYOUTS[level];

  return reader => {
    const stationId = reader.readUnsigned(12);
    const epoch = reader.readUnsigned(30);
    const multipleMessage = reader.readBool();
    const issueOfDataStation = reader.readUnsigned(3);
    reader.skip(7);
    const clockSteering = reader.readUnsigned(2);
    const externalClock = reader.readUnsigned(2);
    const smoothing = reader.readBool();
    const smoothingInterval = reader.readUnsigned(3);

    const satelliteIds = reader.readMask(64);
    const signalIds = reader.readMask(32);

    // One cell per (satellite, signal) pair that was actually observed
    const cells: Array<{ satellite: number; signalId: number }> = [];
    for (let satellite = 0; satellite < satelliteIds.length; satellite++) {
      for (const signalId of signalIds) {
        if (reader.readBool()) {
          cells.push({ satellite, signalId });
        }
      }
    }

    const nsat = satelliteIds.length;
    const roughMilliseconds = readEach(nsat, () => reader.readUnsigned(8));
    const extendedInfo = layout.hasRates ? readEach(nsat, () => reader.readUnsigned(4)) : undefined;
    const roughFraction = readEach(nsat, () => reader.readUnsigned(10) / 1024);
    const roughRates = layout.hasRates ? readEach(nsat, () => reader.readSigned(14)) : undefined;

    const ncell = cells.length;
    const pseudoranges = readEach(ncell, () =>
      reader.readScaled(layout.pseudorangeBits, layout.pseudorangeScale) * RANGE_UNIT_MSM);
    const phaseRanges = readEach(ncell, () =>
      reader.readScaled(layout.phaseRangeBits, layout.phaseRangeScale) * RANGE_UNIT_MSM);
    const lockTimes = readEach(ncell, () => reader.readUnsigned(layout.lockTimeBits));
    const halfCycles = readEach(ncell, () => reader.readBool());
    const cnrs = readEach(ncell, () => reader.readScaled(layout.cnrBits, layout.cnrScale, 'unsigned'));
    const phaseRates = layout.hasRates ? readEach(ncell, () => reader.readScaled(15, 0.0001)) : undefined;

    const satellites: MsmSatellite[] = satelliteIds.map((satelliteId, index) => {
      const satellite: MsmSatellite = {
        satelliteId,
        prn: formatPrn(prefix, satelliteId),
        roughRange: (roughMilliseconds[index] + roughFraction[index]) * RANGE_UNIT_MSM,
        cnr: 0,
        signals: [],
      };
      if (extendedInfo && roughRates) {
        satellite.extendedInfo = extendedInfo[index];
        satellite.roughPhaseRangeRate = roughRates[index];
      }
      return satellite;
    });

    cells.forEach((cell, index) => {
      const signal: MsmSignal = {
        signalId: cell.signalId,
        finePseudorange: pseudoranges[index],
        finePhaseRange: phaseRanges[index],
        lockTimeIndicator: lockTimes[index],
        halfCycleAmbiguity: halfCycles[index],
        cnr: cnrs[index],
      };
      if (phaseRates) {
        signal.finePhaseRangeRate = phaseRates[index];
      }

      const satellite = satellites[cell.satellite];
      satellite.signals.push(signal);
      satellite.cnr = Math.max(satellite.cnr, signal.cnr);
    });

    const body: MultipleSignalMessage = {
      kind: 'msm',
      constellation,
      level,
      stationId,
      epochTime: (constellation === 'glonass' ? epoch % GLONASS_TIME_OF_DAY_RANGE : epoch) * 0.001,
      multipleMessage,
      issueOfDataStation,
      clockSteering,
      externalClock,
      smoothing,
      smoothingInterval,
      satellites,
    };
    if (constellation === 'glonass') {
      body.dayOfWeek = Math.floor(epoch / GLONASS_TIME_OF_DAY_RANGE);
    }
    return body;
  };
}

function readEach<T>(count: number, read: () => T): T[] {
  const values: T[] = [];
  for (let i = 0; i < count; i++) {
    values.push(read());
  }
  return values;
}

function formatPrn(prefix: string, satelliteId: number): string {
  return `${prefix}${String(satelliteId).padStart(2, '0')}`;
}

// =============================================================================
// Legacy RTK observables
// =============================================================================

export const LEGACY_PSEUDORANGE_RESOLUTION = 0.02;
export const LEGACY_PHASE_RESOLUTION = 0.0005;
export const LEGACY_CNR_RESOLUTION = 0.25;

/** GLONASS frequency channels are sent as channel + 7 */
export const GLONASS_CHANNEL_OFFSET = 7;

export interface LegacyLayout {
  prefix: string;
  /** L1-only basic message; +1 extended, +2 dual frequency */
  baseType: number;
  epochBits: number;
  l1PseudorangeBits: number;
  ambiguityBits: number;
  /** Metres per ambiguity unit */
  ambiguityUnit: number;
  hasFrequencyChannel: boolean;
}

export const LEGACY_LAYOUTS: Readonly<Record<RtkObservables['constellation'], LegacyLayout>> = {
  gps: {
    prefix: 'G',
    baseType: 1001,
    epochBits: 30,
    l1PseudorangeBits: 24,
    ambiguityBits: 8,
    ambiguityUnit: RANGE_UNIT_MSM,
    hasFrequencyChannel: false,
  },
  glonass: {
    prefix: 'R',
    baseType: 1009,
    epochBits: 27,
    l1PseudorangeBits: 25,
    ambiguityBits: 7,
    ambiguityUnit: 2 * RANGE_UNIT_MSM,
    hasFrequencyChannel: true,
  },
};

export function legacyMessageType(
  body: Pick<RtkObservables, 'constellation' | 'dualFrequency' | 'extended'>,
): number {
  return LEGACY_LAYOUTS[body.constellation].baseType + (body.dualFrequency ? 2 : 0) + (body.extended ? 1 : 0);
}

/**
 * L1 pseudorange in metres with the ambiguity added back. Undefined for
 * basic messages, which carry no ambiguity.
 */
export function fullL1Pseudorange(
  constellation: RtkObservables['constellation'],
  satellite: LegacySatellite,
): number | undefined {
  if (satellite.ambiguity === undefined || satellite.l1.pseudorange === undefined) {
    return undefined;
  }
  return satellite.l1.pseudorange + satellite.ambiguity * LEGACY_LAYOUTS[constellation].ambiguityUnit;
}

/** Signed field whose most negative value marks a missing measurement */
export function readOptionalScaled(reader: BitReader, bits: number, scale: number): number | undefined {
  const raw = reader.readSigned(bits);
  return raw === -(2 ** (bits - 1)) ? undefined : raw * scale;
}

function readLegacySatellite(
  reader: BitReader,
  layout: LegacyLayout,
  dualFrequency: boolean,
  extended: boolean,
): LegacySatellite {
  const satelliteId = reader.readUnsigned(6);
  const codeIndicator = reader.readUnsigned(1);
  const frequencyChannel = layout.hasFrequencyChannel
    ? reader.readUnsigned(5) - GLONASS_CHANNEL_OFFSET
    : undefined;

  const l1: LegacySignal = {
    codeIndicator,
    pseudorange: reader.readUnsigned(layout.l1PseudorangeBits) * LEGACY_PSEUDORANGE_RESOLUTION,
    phaseRangeDifference: readOptionalScaled(reader, 20, LEGACY_PHASE_RESOLUTION),
    lockTimeIndicator: reader.readUnsigned(7),
  };
  const satellite: LegacySatellite = { satelliteId, prn: formatPrn(layout.prefix, satelliteId), l1 };
  if (frequencyChannel !== undefined) {
    satellite.frequencyChannel = frequencyChannel;
  }
  if (extended) {
    satellite.ambiguity = reader.readUnsigned(layout.ambiguityBits);
    l1.cnr = reader.readUnsigned(8) * LEGACY_CNR_RESOLUTION;
  }

  if (dualFrequency) {
    const l2: LegacySignal = {
      codeIndicator: reader.readUnsigned(2),
      pseudorange: readOptionalScaled(reader, 14, LEGACY_PSEUDORANGE_RESOLUTION),
      phaseRangeDifference: readOptionalScaled(reader, 20, LEGACY_PHASE_RESOLUTION),
      lockTimeIndicator: reader.readUnsigned(7),
    };
    if (extended) {
      l2.cnr = reader.readUnsigned(8) * LEGACY_CNR_RESOLUTION;
    }
    satellite.l2 = l2;
  }
  return satellite;
}

function createLegacyDecoder(
  constellation: RtkObservables['constellation'],
  dualFrequency: boolean,
  extended: boolean,
): BodyDecoder {
  const layout = LEGACY_LAYOUTS[constellation];

  return reader => {
    const stationId = reader.readUnsigned(12);
    const epochTime = reader.readUnsigned(layout.epochBits) * 0.001;
    const synchronous = reader.readBool();
    const count = reader.readUnsigned(5);
    const smoothing = reader.readBool();
    const smoothingInterval = reader.readUnsigned(3);

    const body: RtkObservables = {
      kind: 'rtk-observables',
      constellation,
      stationId,
      epochTime,
      synchronous,
      smoothing,
      smoothingInterval,
      dualFrequency,
      extended,
      satellites: readEach(count, () => readLegacySatellite(reader, layout, dualFrequency, extended)),
    };
    return body;
  };
}

// =============================================================================
// GPS ephemeris
// =============================================================================

/** π as GPS defines it for semicircle conversions */
export const GPS_PI = 3.1415926535898;

export const EPHEMERIS_SCALE = {
  time: 16,
  clockBias: 2 ** -31,
  clockDrift: 2 ** -43,
  clockDriftRate: 2 ** -55,
  radius: 2 ** -5,
  harmonic: 2 ** -29,
  angle: GPS_PI * 2 ** -31,
  angleRate: GPS_PI * 2 ** -43,
  eccentricity: 2 ** -33,
  sqrtA: 2 ** -19,
} as const;

const decodeGpsEphemeris: BodyDecoder = reader => {
  const satelliteId = reader.readUnsigned(6);
  const scale = EPHEMERIS_SCALE;

  // Fields are read in wire order
  const body: GpsEphemeris = {
    kind: 'gps-ephemeris',
    satelliteId,
    prn: formatPrn('G', satelliteId),
    week: reader.readUnsigned(10),
    uraIndex: reader.readUnsigned(4),
    codeOnL2: reader.readUnsigned(2),
    iDot: reader.readScaled(14, scale.angleRate),
    iode: reader.readUnsigned(8),
    toc: reader.readScaled(16, scale.time, 'unsigned'),
    af2: reader.readScaled(8, scale.clockDriftRate),
    af1: reader.readScaled(16, scale.clockDrift),
    af0: reader.readScaled(22, scale.clockBias),
    iodc: reader.readUnsigned(10),
    crs: reader.readScaled(16, scale.radius),
    deltaN: reader.readScaled(16, scale.angleRate),
    m0: reader.readScaled(32, scale.angle),
    cuc: reader.readScaled(16, scale.harmonic),
    eccentricity: reader.readScaled(32, scale.eccentricity, 'unsigned'),
    cus: reader.readScaled(16, scale.harmonic),
    sqrtA: reader.readScaled(32, scale.sqrtA, 'unsigned'),
    toe: reader.readScaled(16, scale.time, 'unsigned'),
    cic: reader.readScaled(16, scale.harmonic),
    omega0: reader.readScaled(32, scale.angle),
    cis: reader.readScaled(16, scale.harmonic),
    i0: reader.readScaled(32, scale.angle),
    crc: reader.readScaled(16, scale.radius),
    omega: reader.readScaled(32, scale.angle),
    omegaDot: reader.readScaled(24, scale.angleRate),
    tgd: reader.readScaled(8, scale.clockBias),
    health: reader.readUnsigned(6),
    l2PDataFlag: reader.readBool(),
    extendedFitInterval: reader.readBool(),
  };
  return body;
};

// =============================================================================
// GLONASS code-phase biases
// =============================================================================

const GLONASS_BIAS_SIGNALS = ['l1ca', 'l1p', 'l2ca', 'l2p'] as const;

const decodeGlonassBiases: BodyDecoder = reader => {
  const stationId = reader.readUnsigned(12);
  const aligned = reader.readBool();
  reader.skip(3);
  const mask = reader.readUnsigned(4);

  const biases: GlonassCodePhaseBiases['biases'] = {};
  GLONASS_BIAS_SIGNALS.forEach((signal, index) => {
    if (mask & (0b1000 >> index)) {
      biases[signal] = reader.readScaled(16, GLONASS_BIAS_RESOLUTION);
    }
  });

  const body: GlonassCodePhaseBiases = { kind: 'glonass-biases', stationId, aligned, biases };
  return body;
};

// =============================================================================
// Registry
// =============================================================================

function buildRegistry(): ReadonlyMap<number, BodyDecoder> {
  const registry = new Map<number, BodyDecoder>([
    [1005, decodeAntennaReferencePoint],
    [1006, decodeAntennaReferencePoint],
    [1007, decodeAntennaDescriptor],
    [1008, decodeAntennaDescriptor],
    [1019, decodeGpsEphemeris],
    [1033, decodeReceiverAntennaDescriptor],
    [1230, decodeGlonassBiases],
  ]);

  for (const constellation of ['gps', 'glonass'] as const) {
    const { baseType } = LEGACY_LAYOUTS[constellation];
    for (let offset = 0; offset < 4; offset++) {
      registry.set(baseType + offset, createLegacyDecoder(constellation, offset >= 2, offset % 2 === 1));
    }
  }

  for (const { base, constellation, prefix } of MSM_CONSTELLATIONS) {
    for (const level of MSM_LEVELS) {
      registry.set(base + level, createMsmDecoder(constellation, prefix, level));
    }
  }
  return registry;
}

export const RTCM_DECODERS: ReadonlyMap<number, BodyDecoder> = buildRegistry();

export function isDecodedMessageType(messageType: number): boolean {
  return RTCM_DECODERS.has(messageType);
}

/**
 * Decodes one CRC-checked payload. Throws FieldBoundsError when a field runs
 * past the end; unregistered types come back as opaque payloads.
 */
export function decodeRtcmPayload(payload: Uint8Array): RtcmMessage {
  const reader = new BitReader(payload);
  const messageType = reader.readUnsigned(MESSAGE_TYPE_BITS);
  const decoder = RTCM_DECODERS.get(messageType);

  return {
    messageType,
    bitLength: payload.length * 8,
    body: decoder ? decoder(reader, messageType) : { kind: 'opaque', payload: Uint8Array.from(payload) },
  };
}
