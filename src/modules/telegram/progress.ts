import type { Api } from 'grammy';

type ProgressApi = Pick<Api, 'deleteMessage'>;

/** Runs `task` and removes the progress message afterwards, also when the task throws. */
export async function withProgressMessage<T>(
  api: ProgressApi,
  chatId: number,
  messageId: number,
  task: () => Promise<T>,
): Promise<T> {
  try {
    return await task();
  } finally {
    try {
      await api.deleteMessage(chatId, messageId);
    } catch (error) {
      console.error('[PROGRESS] Failed to remove progress message:', error);
    }
  }
}
