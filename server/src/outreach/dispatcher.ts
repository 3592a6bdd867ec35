import type { SenderProfile } from '../lib/config.js';
import defaultLogger, { type Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/outcome.js';
import { sleep as realSleep, type Sleep } from '../lib/timing.js';
import type { ContactHistoryStore } from './history-store.js';
import type { MailTransport } from './mail-transport.js';
import { renderOutreachMessage } from './message-renderer.js';
import type { Candidate, ContactStatus, JobProfile } from './types.js';

export interface DispatchResult {
  sent: number;
  failed: number;
  sentAddresses: Candidate[];
  /** Attempts whose history row could not be written. */
  unrecorded: number;
}

export interface DispatcherOptions {
  transport: MailTransport;
  store: ContactHistoryStore;
  sender: SenderProfile;
  delayMs: number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Sends one message per recipient, strictly one at a time, and appends one
 * history row per attempt. A failed send or a failed history write never
 * stops the loop. Every attempt is followed by `delayMs`.
 */
export class Dispatcher {
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(private readonly options: DispatcherOptions) {
    this.sleep = options.sleep ?? realSleep;
    this.log = options.logger ?? defaultLogger;
  }

  async dispatch(profile: JobProfile, recipients: readonly Candidate[], log: Logger = this.log): Promise<DispatchResult> {
    const { transport, store, sender, delayMs } = this.options;
    const result: DispatchResult = { sent: 0, failed: 0, sentAddresses: [], unrecorded: 0 };

    for (const recipient of new Set(recipients)) {
      const message = renderOutreachMessage(profile, recipient, sender);
      const outcome = await transport.send({ to: recipient, subject: message.subject, text: message.body });
      const status: ContactStatus = outcome.ok ? 'sent' : 'failed';

      if (outcome.ok) {
        result.sent += 1;
        result.sentAddresses.push(recipient);
        log.info({ recipient, messageId: outcome.value.messageId }, 'Outreach email sent');
      } else {
        result.failed += 1;
        log.warn({ recipient, error: outcome.error.message }, 'Outreach email failed');
      }

      try {
        await store.insert({ job_title: profile.job_title, recipient_email: recipient, status });
      } catch (err) {
        result.unrecorded += 1;
        log.error({ recipient, status, error: errorMessage(err) }, 'Failed to record contact history');
      }

      await this.sleep(delayMs);
    }

    return result;
  }
}
