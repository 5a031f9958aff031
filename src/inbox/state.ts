import { DEFAULT_MAX_RESULTS, DEFAULT_QUERY } from '../gmail/client.js';

export type NoticeLevel = 'success' | 'info' | 'warning' | 'error';

export type Notice = {
  level: NoticeLevel;
  text: string;
};

/**
 * The listing a user last fetched. Only ids are kept; details are loaded
 * fresh on every view and the whole listing is replaced by the next fetch.
 */
export type InboxState = {
  query: string;
  maxResults: number;
  messageIds: string[];
  fetchedAt: number | null;
};

export function initialInboxState(): InboxState {
  return {
    query: DEFAULT_QUERY,
    maxResults: DEFAULT_MAX_RESULTS,
    messageIds: [],
    fetchedAt: null
  };
}

export const notice = {
  success: (text: string): Notice => ({ level: 'success', text }),
  info: (text: string): Notice => ({ level: 'info', text }),
  warning: (text: string): Notice => ({ level: 'warning', text }),
  error: (text: string): Notice => ({ level: 'error', text })
};
