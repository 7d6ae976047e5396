import { toErrorMessage } from '../../utils/errors';
import type { CollectContext } from './base';
import { parseNoticeDate } from './date';

/**
 * Fetch a notice's detail page to recover a date the listing does not show.
 * Any failure degrades to `now`.
 */
export async function lookupDetailDate(
  link: string,
  selector: string,
  context: CollectContext
): Promise<Date> {
  try {
    const page = await context.fetcher.fetch(link);
    const text = page.$(selector).first().text();
    const parsed = parseNoticeDate(text, context.now);
    if (parsed) {
      return parsed;
    }
    context.logger.debug(`No date in detail page ${link}`);
  } catch (error) {
    context.logger.warn(`Detail date lookup failed for ${link}: ${toErrorMessage(error)}`);
  }
  return new Date(context.now.getTime());
}
