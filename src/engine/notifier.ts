/**
 * Notification channel contract and a fan-out that isolates failures.
 *
 * Notifications are best effort: a failed send is logged and never rolls
 * back or retries the state transition that caused it.
 */

import { errorMessage } from './errors.js';
import type { Issue, RemediationPlan } from './types.js';

export interface NotificationChannel {
  readonly name: string;
  notify(text: string): Promise<void>;
  requestApproval(issue: Issue, approvalId: string, plan: RemediationPlan): Promise<void>;
}

export class FanoutNotifier implements NotificationChannel {
  readonly name = 'fanout';

  constructor(private readonly channels: NotificationChannel[]) {}

  async notify(text: string): Promise<void> {
    await this.each((channel) => channel.notify(text));
  }

  async requestApproval(issue: Issue, approvalId: string, plan: RemediationPlan): Promise<void> {
    await this.each((channel) => channel.requestApproval(issue, approvalId, plan));
  }

  private async each(send: (channel: NotificationChannel) => Promise<void>): Promise<void> {
    const results = await Promise.allSettled(
      this.channels.map(async (channel) => send(channel)),
    );
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        console.error(`[Notify] ${this.channels[i].name} failed:`, errorMessage(result.reason));
      }
    });
  }
}

/** Channel that drops everything. Used when nothing is configured. */
export const silentNotifier: NotificationChannel = {
  name: 'silent',
  async notify() {},
  async requestApproval() {},
};
