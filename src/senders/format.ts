import { SenderCount } from '../types.js';

/**
 * Render a ranked table, one line per sender:
 * `  <rank>. <count>  <address>`, with ranks padded to the width of the
 * requested count and counts padded to the width of the largest count.
 */
export function formatTopSenders(senders: SenderCount[], requested: number): string[] {
  if (senders.length === 0) return [];

  const rankWidth = String(requested).length;
  const countWidth = String(senders[0].count).length;

  return senders.map(({ address, count }, index) => {
    const rank = String(index + 1).padStart(rankWidth);
    return `  ${rank}. ${String(count).padStart(countWidth)}  ${address}`;
  });
}
