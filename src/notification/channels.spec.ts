import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { TelegramChannel } from './telegram.channel';
import { WebhookChannel, webhookBody } from './webhook.channel';

const noContent: AxiosResponse = {
  data: '',
  status: 204,
  statusText: 'No Content',
  headers: {},
  config: { headers: new AxiosHeaders() },
};

describe('TelegramChannel', () => {
  it('sends the text to the configured chat', async () => {
    const sendMessage = jest.fn().mockResolvedValue({ message_id: 1 });
    const telegram = new TelegramChannel({ sendMessage }, '12345');

    await telegram.send('hello');

    expect(sendMessage).toHaveBeenCalledWith('12345', 'hello');
  });
});

describe('WebhookChannel', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('wraps text for plain chat bots', () => {
    expect(webhookBody('text', 'hi')).toEqual({ msgtype: 'text', text: { content: 'hi' } });
  });

  it('posts a Discord payload with the request timeout', async () => {
    const post = jest.spyOn(axios, 'post').mockResolvedValue(noContent);
    const webhook = new WebhookChannel('http://hooks.test/notify', 'discord', 8_000);

    await webhook.send('hi');

    expect(post).toHaveBeenCalledWith('http://hooks.test/notify', { content: 'hi' }, { timeout: 8_000 });
  });

  it('surfaces delivery errors to the caller', async () => {
    jest.spyOn(axios, 'post').mockRejectedValue(new Error('502'));
    const webhook = new WebhookChannel('http://hooks.test/notify', 'text', 8_000);

    await expect(webhook.send('hi')).rejects.toThrow('502');
  });
});
