export { ElectionHost } from './ElectionHost';
export type { ElectionHostConfig, HostCallResult } from './ElectionHost';
export * from './errors';
export * from './signatures';
