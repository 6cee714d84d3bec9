import { describe, it, expect } from '@jest/globals';
import {
  MLLP_FRAME,
  frameMessage,
  hasCompleteMessage,
  unframeMessage,
} from '../../../../src/connectors/mllp/MllpFrame.js';

describe('MllpFrame', () => {
  describe('frameMessage', () => {
    it('should wrap the UTF-8 bytes in START and END markers', () => {
      expect(frameMessage('MSH|^~\\&|A')).toEqual(
        Buffer.from([0x0b, ...Buffer.from('MSH|^~\\&|A', 'utf-8'), 0x1c, 0x0d])
      );
    });

    it('should frame an empty message as three bytes', () => {
      expect(frameMessage('')).toEqual(Buffer.from([0x0b, 0x1c, 0x0d]));
    });

    it('should encode multi-byte characters', () => {
      const framed = frameMessage('é');
      expect(framed).toEqual(Buffer.from([0x0b, 0xc3, 0xa9, 0x1c, 0x0d]));
    });

    it('should not escape marker bytes inside the message', () => {
      expect(frameMessage('A\x0bB\x1c\rC')).toEqual(
        Buffer.from([0x0b, 0x41, 0x0b, 0x42, 0x1c, 0x0d, 0x43, 0x1c, 0x0d])
      );
    });
  });

  describe('hasCompleteMessage', () => {
    it('should be true when the buffer ends with FS CR', () => {
      expect(hasCompleteMessage(Buffer.from([0x0b, 0x41, MLLP_FRAME.END_BLOCK, MLLP_FRAME.CARRIAGE_RETURN]))).toBe(
        true
      );
    });

    it('should be false for a lone FS or a CR without FS', () => {
      expect(hasCompleteMessage(Buffer.from([0x0b, 0x41, 0x1c]))).toBe(false);
      expect(hasCompleteMessage(Buffer.from([0x0b, 0x41, 0x0d]))).toBe(false);
    });

    it('should be false for buffers shorter than the END sequence', () => {
      expect(hasCompleteMessage(Buffer.alloc(0))).toBe(false);
      expect(hasCompleteMessage(Buffer.from([0x0d]))).toBe(false);
    });
  });

  describe('unframeMessage', () => {
    it('should strip both markers from a full frame', () => {
      expect(unframeMessage(Buffer.from([0x0b, 0x41, 0x43, 0x4b, 0x1c, 0x0d])).toString()).toBe('ACK');
    });

    it('should tolerate a missing START byte', () => {
      expect(unframeMessage(Buffer.from([0x41, 0x43, 0x4b, 0x1c, 0x0d])).toString()).toBe('ACK');
    });

    it('should tolerate a missing END sequence', () => {
      expect(unframeMessage(Buffer.from([0x0b, 0x41, 0x43, 0x4b])).toString()).toBe('ACK');
    });

    it('should return unmarked data unchanged', () => {
      expect(unframeMessage(Buffer.from('plain text')).toString()).toBe('plain text');
    });

    it('should strip only one START byte', () => {
      expect(unframeMessage(Buffer.from([0x0b, 0x0b, 0x41, 0x1c, 0x0d]))).toEqual(Buffer.from([0x0b, 0x41]));
    });

    it('should leave an END sequence that is not at the end', () => {
      expect(unframeMessage(Buffer.from([0x0b, 0x41, 0x1c, 0x0d, 0x42]))).toEqual(
        Buffer.from([0x41, 0x1c, 0x0d, 0x42])
      );
    });

    it('should produce an empty payload for an empty frame', () => {
      expect(unframeMessage(Buffer.from([0x0b, 0x1c, 0x0d]))).toHaveLength(0);
    });

    it('should treat a bare END sequence as an empty payload', () => {
      expect(unframeMessage(Buffer.from([0x1c, 0x0d]))).toHaveLength(0);
    });

    it('should keep a trailing CR that has no FS before it', () => {
      expect(unframeMessage(Buffer.from([0x0b, 0x41, 0x0d]))).toEqual(Buffer.from([0x41, 0x0d]));
    });

    it('should return an empty buffer for empty input', () => {
      expect(unframeMessage(Buffer.alloc(0))).toHaveLength(0);
    });

    it('should invert frameMessage', () => {
      const message = 'MSH|^~\\&|Ünïcödé\rPID|1\r';
      expect(unframeMessage(frameMessage(message)).toString('utf-8')).toBe(message);
    });
  });
});
