import { BackendResult } from '../result.js';

/**
 * External search capability usable by the agent path
 */
export interface ISearchTool {
  readonly name: string;
  readonly description: string;
  search(query: string): Promise<BackendResult<string>>;
}
