export { RefreshFlow } from './refresh-flow.service';
export type { RefreshResult } from './refresh-flow.service';
