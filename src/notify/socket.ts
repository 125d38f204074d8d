/**
 * Socket.IO notification channel. Pushes notifications and approval
 * prompts to dashboard clients on the /events namespace.
 */

import { randomUUID } from 'node:crypto';
import type { Namespace } from 'socket.io';
import type { NotificationChannel } from '../engine/notifier.js';
import type { Issue, RemediationPlan } from '../engine/types.js';

export class SocketNotifier implements NotificationChannel {
  readonly name = 'socket';

  constructor(private readonly eventsNs: Namespace) {}

  async notify(text: string): Promise<void> {
    this.eventsNs.emit('event', {
      id: randomUUID(),
      type: 'notification',
      message: text,
      timestamp: new Date().toISOString(),
    });
  }

  async requestApproval(issue: Issue, approvalId: string, plan: RemediationPlan): Promise<void> {
    this.eventsNs.emit('approval:requested', {
      approvalId,
      issue,
      plan,
      timestamp: new Date().toISOString(),
    });
  }
}
