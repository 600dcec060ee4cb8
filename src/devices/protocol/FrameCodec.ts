import { FrameValidationError } from '../../core/errors/LightError';

export const FRAME_LENGTH = 20;
export const FRAME_HEADER = 0x33;
export const MAX_PAYLOAD_LENGTH = 17;

export interface DecodedFrame {
  command: number;
  payload: number[];
}

/**
 * XOR of every byte.
 */
export function computeChecksum(bytes: ArrayLike<number>): number {
  let checksum = 0;
  for (let i = 0; i < bytes.length; i++) {
    checksum ^= bytes[i];
  }
  return checksum & 0xff;
}

function validatePayload(payload: ArrayLike<number>): void {
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new FrameValidationError(
      `Payload too long: ${payload.length} bytes (max ${MAX_PAYLOAD_LENGTH})`,
      'payload.length',
      payload.length
    );
  }

  for (let i = 0; i < payload.length; i++) {
    const byte = payload[i];
    if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
      throw new FrameValidationError(`Invalid payload byte at offset ${i}`, `payload[${i}]`, byte);
    }
  }
}

/**
 * Frames a command as `[0x33, command, payload..., 0-padding, checksum]`.
 * The result is always 20 bytes and the last byte is the XOR of the other 19.
 */
export function encodeFrame(command: number, payload: ArrayLike<number> = []): Buffer {
  if (!Number.isInteger(command)) {
    throw new FrameValidationError('Command must be an integer', 'command', command);
  }
  validatePayload(payload);

  const frame = Buffer.alloc(FRAME_LENGTH);
  frame[0] = FRAME_HEADER;
  frame[1] = command & 0xff;
  for (let i = 0; i < payload.length; i++) {
    frame[2 + i] = payload[i];
  }
  frame[FRAME_LENGTH - 1] = computeChecksum(frame.subarray(0, FRAME_LENGTH - 1));

  return frame;
}

/**
 * Inverse of `encodeFrame`. Padding cannot be told apart from trailing zero
 * payload bytes, so callers that know the payload length pass it in.
 */
export function decodeFrame(frame: Uint8Array, payloadLength: number = MAX_PAYLOAD_LENGTH): DecodedFrame {
  if (frame.length !== FRAME_LENGTH) {
    throw new FrameValidationError(`Frame must be ${FRAME_LENGTH} bytes`, 'frame.length', frame.length);
  }
  if (frame[0] !== FRAME_HEADER) {
    throw new FrameValidationError('Invalid frame header', 'frame[0]', frame[0]);
  }
  if (payloadLength < 0 || payloadLength > MAX_PAYLOAD_LENGTH) {
    throw new FrameValidationError('Invalid payload length', 'payloadLength', payloadLength);
  }

  const expected = computeChecksum(frame.subarray(0, FRAME_LENGTH - 1));
  if (frame[FRAME_LENGTH - 1] !== expected) {
    throw new FrameValidationError('Checksum mismatch', 'frame[19]', frame[FRAME_LENGTH - 1]);
  }

  return {
    command: frame[1],
    payload: Array.from(frame.subarray(2, 2 + payloadLength))
  };
}

export function formatFrame(frame: Uint8Array): string {
  return Array.from(frame, byte => byte.toString(16).padStart(2, '0')).join(' ');
}
