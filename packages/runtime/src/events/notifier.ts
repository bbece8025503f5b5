// Change notifier - synchronous observer list for variable changes
//
// Handlers run on the caller's stack, in registration order, after the
// store mutation has been committed.

import type {
  VariableChangeEvent,
  VariableChangeHandler,
  VariableChangeType,
} from '@appstate/protocol';
import type { StateLogger } from '../logging.js';
import { consoleLogger } from '../logging.js';
import { ChangeHandlerError } from '../errors.js';

/**
 * Handle returned by a registration. Pass it back to `unsubscribe`,
 * or call its own `unsubscribe`.
 */
export type SubscriptionHandle = {
  readonly id: number;
  unsubscribe(): boolean;
};

/**
 * Options for change notification
 */
export type ChangeNotifierOptions = {
  /**
   * Logger for handler failures (defaults to console)
   */
  logger?: StateLogger;

  /**
   * Whether to keep calling handlers after one throws (default: true).
   * When false, the first failure is rethrown as a ChangeHandlerError
   * and the remaining handlers are skipped.
   */
  continueOnError?: boolean;
};

type Subscription = {
  id: number;
  handler: VariableChangeHandler;
};

/**
 * Narrow an event to one change type.
 */
export function isChangeOfType<T extends VariableChangeType>(
  event: VariableChangeEvent,
  type: T
): event is Extract<VariableChangeEvent, { type: T }> {
  return event.type === type;
}

export class ChangeNotifier {
  private subscriptions: Subscription[] = [];
  private nextId = 0;
  private readonly logger: StateLogger;
  private readonly continueOnError: boolean;

  constructor(options: ChangeNotifierOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.continueOnError = options.continueOnError ?? true;
  }

  /**
   * Register a handler for every change type.
   */
  subscribe(handler: VariableChangeHandler): SubscriptionHandle {
    const id = ++this.nextId;
    this.subscriptions.push({ id, handler });

    return {
      id,
      unsubscribe: () => this.removeSubscription(id),
    };
  }

  /**
   * Register a handler for a single change type.
   * Shares the registration order with `subscribe`.
   */
  on<T extends VariableChangeType>(
    type: T,
    handler: VariableChangeHandler<Extract<VariableChangeEvent, { type: T }>>
  ): SubscriptionHandle {
    return this.subscribe((event) => {
      if (isChangeOfType(event, type)) {
        handler(event);
      }
    });
  }

  /**
   * Remove a registration by handle.
   *
   * @returns true if a handler was removed, false if it was already gone
   */
  unsubscribe(handle: SubscriptionHandle): boolean {
    return this.removeSubscription(handle.id);
  }

  /**
   * Deliver an event to every handler in registration order.
   *
   * @throws ChangeHandlerError if a handler fails and continueOnError is false
   */
  notify(event: VariableChangeEvent): void {
    // Handlers may unsubscribe while we iterate
    const subscriptions = [...this.subscriptions];

    for (const subscription of subscriptions) {
      try {
        subscription.handler(event);
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);

        if (!this.continueOnError) {
          throw new ChangeHandlerError(event.variableName, event.type, errorMessage, error);
        }

        this.logger.error(`Change handler failed: ${event.type}`, {
          variableName: event.variableName,
          subscriptionId: subscription.id,
          error: errorMessage,
        });
      }
    }
  }

  /**
   * Number of active registrations.
   */
  subscriberCount(): number {
    return this.subscriptions.length;
  }

  /**
   * Remove all registrations.
   */
  clear(): void {
    this.subscriptions = [];
  }

  private removeSubscription(id: number): boolean {
    const index = this.subscriptions.findIndex((subscription) => subscription.id === id);
    if (index === -1) {
      return false;
    }
    this.subscriptions.splice(index, 1);
    return true;
  }
}
