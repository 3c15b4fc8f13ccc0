import { describe, expect, it, vi } from 'vitest';
import { withProgressMessage } from '../src/modules/telegram/progress.js';

function fakeApi() {
  return { deleteMessage: vi.fn(async (_chatId: number | string, _messageId: number) => true as const) };
}

describe('withProgressMessage', () => {
  it('returns the task result and removes the message', async () => {
    const api = fakeApi();

    await expect(withProgressMessage(api, 42, 7, async () => 'done')).resolves.toBe('done');
    expect(api.deleteMessage).toHaveBeenCalledWith(42, 7);
  });

  it('removes the message when the task throws', async () => {
    const api = fakeApi();

    await expect(
      withProgressMessage(api, 42, 7, async () => {
        throw new TypeError('unexpected');
      }),
    ).rejects.toThrow('unexpected');
    expect(api.deleteMessage).toHaveBeenCalledWith(42, 7);
  });

  it('keeps the task result when the message cannot be removed', async () => {
    const api = { deleteMessage: vi.fn(async (_chatId: number | string, _messageId: number): Promise<true> => {
      throw new Error('message to delete not found');
    }) };
    const logError = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(withProgressMessage(api, 42, 7, async () => 3)).resolves.toBe(3);
    expect(logError).toHaveBeenCalledTimes(1);
    logError.mockRestore();
  });
});
