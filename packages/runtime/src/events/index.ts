// Change notification

export {
  ChangeNotifier,
  isChangeOfType,
  type ChangeNotifierOptions,
  type SubscriptionHandle,
} from './notifier.js';

export { describeChange, logVariableChanges, type ChangeSource } from './log-handler.js';
