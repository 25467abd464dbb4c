/**
 * Outbound push frames
 *
 * Every frame travels as one JSON text frame. A `message` frame is the
 * message record itself, as the recipient would read it from /get_messages.
 */

import type { MessageRecord } from '../types';

export type UserId = number;

export type OutboundFrame = {
  kind: 'message';
  message: MessageRecord;
};

/** Consumed once by the hub loop, never persisted. */
export interface PushJob {
  identity: UserId;
  frame: OutboundFrame;
}

export type FrameEncoder = (frame: OutboundFrame) => string;

export const encodeFrame: FrameEncoder = (frame) => {
  switch (frame.kind) {
    case 'message':
      return JSON.stringify(frame.message);
  }
};

export function messageFrame(message: MessageRecord): OutboundFrame {
  return { kind: 'message', message };
}
