/**
 * Progress Types
 */

export type ProgressStatus =
  | 'starting'
  | 'downloading'
  | 'completed'
  | 'packaging'
  | 'uploading'
  | 'error';

export interface ProgressState {
  userId: number;
  chatId: number;
  /** Message edited in place by every publish */
  messageId: number;
  status: ProgressStatus;
  currentLabel: string;
  /** Always within [0, 100] */
  percentage: number;
  /** Never above totalCount */
  completedCount: number;
  /** Never below 1 */
  totalCount: number;
  uploadPercentage: number;
  uploadStatusLabel: string;
  /** Epoch milliseconds of the last delivered publish, 0 if none */
  lastPublishTime: number;
  collectionName?: string;
  collectionAnnounced: boolean;
  zipPassword: string;
}
