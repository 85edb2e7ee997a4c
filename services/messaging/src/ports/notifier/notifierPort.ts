import type { NotificationEvent } from '../../domain/types/event.types';
import type { UserId } from '../../domain/types/message.types';

/**
 * Pushes an event to every live listener of a user. Delivery is best
 * effort: implementations hand the event off and return, and a throw is
 * treated by callers as a failed delivery, not a failed operation.
 */
export interface Notifier {
  notify(userId: UserId, event: NotificationEvent): void;
}
