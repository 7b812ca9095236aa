import { describe, it, expect, vi } from 'vitest';
import { Api, GrammyError } from 'grammy';
import { GrammyTransport } from './transport.js';

const chat = { id: 70, type: 'private' as const, first_name: 'Test' };

function apiError(description: string): GrammyError {
  return new GrammyError(
    `Call to 'editMessageText' failed! (400: ${description})`,
    { ok: false, error_code: 400, description },
    'editMessageText',
    {}
  );
}

describe('GrammyTransport', () => {
  it('sends inline buttons and returns the message id', async () => {
    const api = new Api('test-token');
    const send = vi.spyOn(api, 'sendMessage').mockResolvedValue({ message_id: 55, date: 0, chat, text: 'Choose' });
    const transport = new GrammyTransport(api);

    const id = await transport.sendText(70, 'Choose', {
      buttons: [[{ text: 'Audio', payload: 'mt|audio|7' }]],
      markdown: true,
    });

    expect(id).toBe(55);
    expect(send).toHaveBeenCalledWith(70, 'Choose', {
      parse_mode: 'Markdown',
      reply_markup: { inline_keyboard: [[{ text: 'Audio', callback_data: 'mt|audio|7' }]] },
    });
  });

  it('retries a failed edit up to three attempts', async () => {
    const api = new Api('test-token');
    const edit = vi.spyOn(api, 'editMessageText')
      .mockRejectedValueOnce(new Error('network down'))
      .mockRejectedValueOnce(new Error('network down'))
      .mockResolvedValue(true);
    const transport = new GrammyTransport(api, { editRetryDelayMs: 0 });

    await expect(transport.editText(70, 55, 'Progress')).resolves.toBe(true);
    expect(edit).toHaveBeenCalledTimes(3);
  });

  it('gives up after the last attempt', async () => {
    const api = new Api('test-token');
    const edit = vi.spyOn(api, 'editMessageText').mockRejectedValue(new Error('network down'));
    const transport = new GrammyTransport(api, { editRetryDelayMs: 0 });

    await expect(transport.editText(70, 55, 'Progress')).resolves.toBe(false);
    expect(edit).toHaveBeenCalledTimes(3);
  });

  it('treats an unchanged message as a successful edit', async () => {
    const api = new Api('test-token');
    const edit = vi.spyOn(api, 'editMessageText').mockRejectedValue(
      apiError('Bad Request: message is not modified: specified new message content is exactly the same')
    );
    const transport = new GrammyTransport(api, { editRetryDelayMs: 0 });

    await expect(transport.editText(70, 55, 'Progress')).resolves.toBe(true);
    expect(edit).toHaveBeenCalledTimes(1);
  });

  it('replaces the button grid', async () => {
    const api = new Api('test-token');
    const edit = vi.spyOn(api, 'editMessageReplyMarkup').mockResolvedValue(true);
    const transport = new GrammyTransport(api);

    await expect(transport.editButtons(70, 55, [[{ text: '720p', payload: 'vq|720|7' }]])).resolves.toBe(true);
    expect(edit).toHaveBeenCalledWith(70, 55, {
      reply_markup: { inline_keyboard: [[{ text: '720p', callback_data: 'vq|720|7' }]] },
    });
  });

  it('reports a failed upload of a file as false', async () => {
    const api = new Api('test-token');
    vi.spyOn(api, 'sendDocument').mockRejectedValue(new Error('Request Entity Too Large'));
    const transport = new GrammyTransport(api);

    await expect(transport.sendFile(70, '/tmp/archive.bin', 'document')).resolves.toBe(false);
  });

  it('sends documents with a caption', async () => {
    const api = new Api('test-token');
    const send = vi.spyOn(api, 'sendDocument').mockResolvedValue({
      message_id: 56,
      date: 0,
      chat,
      document: { file_id: 'file', file_unique_id: 'unique' },
    });
    const transport = new GrammyTransport(api);

    await expect(transport.sendFile(70, '/tmp/notes.txt', 'document', 'Done')).resolves.toBe(true);
    expect(send).toHaveBeenCalledWith(70, expect.anything(), { caption: 'Done' });
  });
});
