export { describeError } from './describe-error';
export { UsageError } from './usage-error';
