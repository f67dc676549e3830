import { BitWriter } from '../utils/bits';
import { crc24q } from '../utils/crc24q';
import {
  ANTENNA_UNITS_PER_METRE,
  EPHEMERIS_SCALE,
  GLONASS_CHANNEL_OFFSET,
  LEGACY_CNR_RESOLUTION,
  LEGACY_LAYOUTS,
  LEGACY_PHASE_RESOLUTION,
  LEGACY_PSEUDORANGE_RESOLUTION,
  legacyMessageType,
  MESSAGE_TYPE_BITS,
} from './RtcmMessages';
import type {
  AntennaDescriptor,
  AntennaReferencePoint,
  GpsEphemeris,
  ReceiverAntennaDescriptor,
  RtcmMessage,
  RtkObservables,
} from '../types/Rtcm';

/**
 * RTCM3 frame encoder
 */

export const RTCM_PREAMBLE = 0xd3;
export const RTCM_MAX_PAYLOAD_LENGTH = 1023;
/** Preamble, reserved bits and length */
export const RTCM_HEADER_LENGTH = 3;
export const RTCM_CRC_LENGTH = 3;

/**
 * Wraps a payload in preamble, length and CRC-24Q
 */
export function encodeRtcmFrame(payload: Uint8Array): Buffer {
  if (payload.length > RTCM_MAX_PAYLOAD_LENGTH) {
    throw new RangeError(`RTCM3 payload of ${payload.length} bytes exceeds ${RTCM_MAX_PAYLOAD_LENGTH}`);
  }

  const frame = Buffer.alloc(RTCM_HEADER_LENGTH + payload.length + RTCM_CRC_LENGTH);
  frame[0] = RTCM_PREAMBLE;
  frame[1] = payload.length >> 8;
  frame[2] = payload.length & 0xff;
  frame.set(payload, RTCM_HEADER_LENGTH);

  const crc = crc24q(frame, 0, RTCM_HEADER_LENGTH + payload.length);
  frame.writeUIntBE(crc, RTCM_HEADER_LENGTH + payload.length, RTCM_CRC_LENGTH);
  return frame;
}

/**
 * Encodes a message back into a frame. Opaque payloads are framed as they
 * are; other bodies are re-serialized. MSM and bias bodies are decode-only.
 */
export function encodeRtcmMessage(message: RtcmMessage): Buffer {
  const { body, messageType } = message;

  switch (body.kind) {
    case 'opaque':
      return encodeRtcmFrame(body.payload);
    case 'antenna-reference-point':
      return encodeAntennaReferencePoint(body, messageType === 1006 ? 1006 : 1005);
    case 'antenna-descriptor':
      return encodeAntennaDescriptor(body, messageType === 1008 ? 1008 : 1007);
    case 'receiver-antenna-descriptor':
      return encodeReceiverAntennaDescriptor(body);
    case 'rtk-observables':
      return encodeRtkObservables(body);
    case 'gps-ephemeris':
      return encodeGpsEphemeris(body);
    default:
      throw new RangeError(`Encoding ${body.kind} messages (type ${messageType}) is not supported`);
  }
}

/**
 * 1005, or 1006 when the body carries an antenna height
 */
export function encodeAntennaReferencePoint(
  body: AntennaReferencePoint,
  messageType: 1005 | 1006 = body.antennaHeight === undefined ? 1005 : 1006,
): Buffer {
  const writer = new BitWriter()
    .writeUnsigned(MESSAGE_TYPE_BITS, messageType)
    .writeUnsigned(12, body.stationId)
    .writeUnsigned(6, body.itrfYear)
    .writeBool(body.systems.gps)
    .writeBool(body.systems.glonass)
    .writeBool(body.systems.galileo)
    .writeBool(body.isReferenceStation)
    .writeSigned(38, toAntennaUnits(body.position.x))
    .writeBool(body.singleReceiverOscillator)
    .writeUnsigned(1, 0)
    .writeSigned(38, toAntennaUnits(body.position.y))
    .writeUnsigned(2, body.quarterCycleIndicator)
    .writeSigned(38, toAntennaUnits(body.position.z));

  if (messageType === 1006) {
    writer.writeUnsigned(16, toAntennaUnits(body.antennaHeight ?? 0));
  }
  return encodeRtcmFrame(writer.toBytes());
}

export function encodeAntennaDescriptor(body: AntennaDescriptor, messageType: 1007 | 1008 = 1007): Buffer {
  const writer = new BitWriter()
    .writeUnsigned(MESSAGE_TYPE_BITS, messageType)
    .writeUnsigned(12, body.stationId);
  writeCountedString(writer, body.descriptor);
  writer.writeUnsigned(8, body.setupId);

  if (messageType === 1008) {
    writeCountedString(writer, body.serialNumber ?? '');
  }
  return encodeRtcmFrame(writer.toBytes());
}

export function encodeReceiverAntennaDescriptor(body: ReceiverAntennaDescriptor): Buffer {
  const writer = new BitWriter()
    .writeUnsigned(MESSAGE_TYPE_BITS, 1033)
    .writeUnsigned(12, body.stationId);
  writeCountedString(writer, body.antennaDescriptor);
  writer.writeUnsigned(8, body.antennaSetupId);
  writeCountedString(writer, body.antennaSerialNumber);
  writeCountedString(writer, body.receiverType);
  writeCountedString(writer, body.firmwareVersion);
  writeCountedString(writer, body.receiverSerialNumber);
  return encodeRtcmFrame(writer.toBytes());
}

/**
 * 1001 to 1004 or 1009 to 1012, picked from the constellation and the
 * `dualFrequency` and `extended` flags
 */
export function encodeRtkObservables(body: RtkObservables): Buffer {
  const layout = LEGACY_LAYOUTS[body.constellation];
  const messageType = legacyMessageType(body);
  const writer = new BitWriter()
    .writeUnsigned(MESSAGE_TYPE_BITS, messageType)
    .writeUnsigned(12, body.stationId)
    .writeUnsigned(layout.epochBits, Math.round(body.epochTime * 1000))
    .writeBool(body.synchronous)
    .writeUnsigned(5, body.satellites.length)
    .writeBool(body.smoothing)
    .writeUnsigned(3, body.smoothingInterval);

  for (const satellite of body.satellites) {
    const { l1, l2 } = satellite;
    writer.writeUnsigned(6, satellite.satelliteId).writeUnsigned(1, l1.codeIndicator);
    if (layout.hasFrequencyChannel) {
      writer.writeUnsigned(5, (satellite.frequencyChannel ?? 0) + GLONASS_CHANNEL_OFFSET);
    }
    writer.writeUnsigned(layout.l1PseudorangeBits, toUnits(l1.pseudorange ?? 0, LEGACY_PSEUDORANGE_RESOLUTION));
    writeOptionalScaled(writer, 20, l1.phaseRangeDifference, LEGACY_PHASE_RESOLUTION);
    writer.writeUnsigned(7, l1.lockTimeIndicator);
    if (body.extended) {
      writer
        .writeUnsigned(layout.ambiguityBits, satellite.ambiguity ?? 0)
        .writeUnsigned(8, toUnits(l1.cnr ?? 0, LEGACY_CNR_RESOLUTION));
    }

    if (body.dualFrequency) {
      if (!l2) {
        throw new RangeError(`Satellite ${satellite.prn} has no L2 observables for message type ${messageType}`);
      }
      writer.writeUnsigned(2, l2.codeIndicator);
      writeOptionalScaled(writer, 14, l2.pseudorange, LEGACY_PSEUDORANGE_RESOLUTION);
      writeOptionalScaled(writer, 20, l2.phaseRangeDifference, LEGACY_PHASE_RESOLUTION);
      writer.writeUnsigned(7, l2.lockTimeIndicator);
      if (body.extended) {
        writer.writeUnsigned(8, toUnits(l2.cnr ?? 0, LEGACY_CNR_RESOLUTION));
      }
    }
  }
  return encodeRtcmFrame(writer.toBytes());
}

export function encodeGpsEphemeris(body: GpsEphemeris): Buffer {
  const scale = EPHEMERIS_SCALE;
  const writer = new BitWriter()
    .writeUnsigned(MESSAGE_TYPE_BITS, 1019)
    .writeUnsigned(6, body.satelliteId)
    .writeUnsigned(10, body.week)
    .writeUnsigned(4, body.uraIndex)
    .writeUnsigned(2, body.codeOnL2)
    .writeSigned(14, toUnits(body.iDot, scale.angleRate))
    .writeUnsigned(8, body.iode)
    .writeUnsigned(16, toUnits(body.toc, scale.time))
    .writeSigned(8, toUnits(body.af2, scale.clockDriftRate))
    .writeSigned(16, toUnits(body.af1, scale.clockDrift))
    .writeSigned(22, toUnits(body.af0, scale.clockBias))
    .writeUnsigned(10, body.iodc)
    .writeSigned(16, toUnits(body.crs, scale.radius))
    .writeSigned(16, toUnits(body.deltaN, scale.angleRate))
    .writeSigned(32, toUnits(body.m0, scale.angle))
    .writeSigned(16, toUnits(body.cuc, scale.harmonic))
    .writeUnsigned(32, toUnits(body.eccentricity, scale.eccentricity))
    .writeSigned(16, toUnits(body.cus, scale.harmonic))
    .writeUnsigned(32, toUnits(body.sqrtA, scale.sqrtA))
    .writeUnsigned(16, toUnits(body.toe, scale.time))
    .writeSigned(16, toUnits(body.cic, scale.harmonic))
    .writeSigned(32, toUnits(body.omega0, scale.angle))
    .writeSigned(16, toUnits(body.cis, scale.harmonic))
    .writeSigned(32, toUnits(body.i0, scale.angle))
    .writeSigned(16, toUnits(body.crc, scale.radius))
    .writeSigned(32, toUnits(body.omega, scale.angle))
    .writeSigned(24, toUnits(body.omegaDot, scale.angleRate))
    .writeSigned(8, toUnits(body.tgd, scale.clockBias))
    .writeUnsigned(6, body.health)
    .writeBool(body.l2PDataFlag)
    .writeBool(body.extendedFitInterval);
  return encodeRtcmFrame(writer.toBytes());
}

function toUnits(value: number, resolution: number): number {
  return Math.round(value / resolution);
}

/** Undefined is written as the most negative value, the missing-measurement marker */
function writeOptionalScaled(writer: BitWriter, bits: number, value: number | undefined, resolution: number): void {
  writer.writeSigned(bits, value === undefined ? -(2 ** (bits - 1)) : toUnits(value, resolution));
}

function toAntennaUnits(metres: number): number {
  return Math.round(metres * ANTENNA_UNITS_PER_METRE);
}

function writeCountedString(writer: BitWriter, text: string): void {
  writer.writeUnsigned(8, text.length).writeString(text);
}
