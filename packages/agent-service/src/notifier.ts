import { NotifyError, describeError, systemClock } from '@stayhound/shared';
import type { Candidate, Clock, PriceDropReport, SearchCriteria, TrackedItem } from '@stayhound/shared';
import {
  formatNewItemsMessage,
  formatPriceDropMessage,
  formatTargetPriceMessage,
  formatTestMessage,
  splitMessage,
} from './notifications.js';

export type NotifyBatch =
  | { kind: 'new_items'; items: TrackedItem[]; criteria: SearchCriteria }
  | { kind: 'price_drop'; drops: PriceDropReport[] }
  | { kind: 'target_price'; items: Candidate[]; targetPrice: number; currency: string }
  | { kind: 'test' };

export interface Notifier {
  /** Resolves true once delivered. Throws NotifyError when delivery fails. */
  notify(batch: NotifyBatch): Promise<boolean>;
}

/** The slice of grammy's `Api` the notifier sends through. */
export interface MessageSender {
  sendMessage(
    chatId: number | string,
    text: string,
    other?: { link_preview_options?: { is_disabled?: boolean } },
  ): Promise<unknown>;
}

export function renderBatch(batch: NotifyBatch, now: Date): string {
  switch (batch.kind) {
    case 'new_items':
      return formatNewItemsMessage(batch.items, batch.criteria);
    case 'price_drop':
      return formatPriceDropMessage(batch.drops);
    case 'target_price':
      return formatTargetPriceMessage(batch.items, batch.targetPrice, batch.currency);
    case 'test':
      return formatTestMessage(now);
  }
}

export function createTelegramNotifier(
  api: MessageSender,
  chatId: number | string,
  options: { now?: Clock } = {},
): Notifier {
  const now = options.now ?? systemClock;

  return {
    async notify(batch) {
      const chunks = splitMessage(renderBatch(batch, now()));

      try {
        for (const chunk of chunks) {
          await api.sendMessage(chatId, chunk, { link_preview_options: { is_disabled: true } });
        }
      } catch (err) {
        throw new NotifyError(`Telegram delivery of ${batch.kind} failed: ${describeError(err)}`, { cause: err });
      }

      console.log(`[notifier] Sent ${batch.kind} notification in ${chunks.length} message(s)`);
      return true;
    },
  };
}
