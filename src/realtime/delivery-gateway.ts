/**
 * Delivery Gateway
 *
 * The message path's only door into the hub. Called after the message log
 * append has committed; delivery is best effort and never reported back.
 */

import type { Logger } from '../logger';
import { hubLogger } from '../logger';
import type { MessageRecord } from '../types';
import { messageFrame } from './frames';
import type { UserId } from './frames';
import type { PushSink } from './hub';

export interface MessageNotifier {
  notifyMessageStored(recipientId: UserId, message: MessageRecord): void;
}

export class DeliveryGateway implements MessageNotifier {
  constructor(
    private readonly hub: PushSink,
    private readonly log: Logger = hubLogger
  ) {}

  notifyMessageStored(recipientId: UserId, message: MessageRecord): void {
    try {
      this.hub.submit(recipientId, messageFrame(message));
    } catch (err) {
      this.log.error({ err, recipientId, messageId: message.id }, 'Push submit failed');
    }
  }
}
