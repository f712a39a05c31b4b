import { CalendarAccount } from '../types';
import { CalendarEvent } from './types';

export const COMPLETED_PREFIX = '✅ ';
export const COMPLETED_COLOR_ID = '8';

/** An event is a to-do when it carries the account's marker color or a hashtag in its title. */
export function isTaskLike(account: CalendarAccount, event: CalendarEvent): boolean {
  if (account.marker_color && event.color_id === account.marker_color) {
    return true;
  }
  return account.marker_hashtag && event.title.includes('#');
}

/** Cancelled or free-time events count as done. */
export function isDoneOnCalendar(event: CalendarEvent): boolean {
  return event.status === 'cancelled' || event.transparency === 'transparent';
}

export function completedTitle(title: string): string {
  return title.startsWith(COMPLETED_PREFIX) ? title : `${COMPLETED_PREFIX}${title}`;
}
