import { EmailNotificationAdapter } from '../../src/system/notification';
import { MailConfig } from '../../src/config';
import { RecordingTransport } from '../helpers/fakes';

const mailConfig: MailConfig = {
  smtpHost: 'smtp.test',
  smtpPort: 587,
  smtpUser: 'mailer@fydy.ai',
  smtpPass: 'test-secret',
  fromEmail: 'robot@fydy.ai'
};

describe('EmailNotificationAdapter', () => {
  let transport: RecordingTransport;

  beforeEach(() => {
    transport = new RecordingTransport();
  });

  it('should send plain text mail from the configured address', async () => {
    const adapter = new EmailNotificationAdapter(mailConfig, transport);

    const result = await adapter.send({ recipient: 'ana@fydy.ai', title: 'Hello', content: 'Body text' });

    expect(result.success).toBe(true);
    expect(result.channel).toBe('email');
    expect(result.messageId).toBe('<1@test>');
    expect(transport.sent).toEqual([
      { from: 'robot@fydy.ai', to: 'ana@fydy.ai', subject: 'Hello', text: 'Body text' }
    ]);
  });

  it('should fall back to the SMTP user as sender', async () => {
    const adapter = new EmailNotificationAdapter({ ...mailConfig, fromEmail: '' }, transport);

    await adapter.send({ recipient: 'ana@fydy.ai', title: 'Hello', content: 'Body text' });

    expect(transport.sent[0].from).toBe('mailer@fydy.ai');
  });

  it('should report transport failures in the result', async () => {
    transport.failWith = new Error('connection refused');
    const adapter = new EmailNotificationAdapter(mailConfig, transport);

    const result = await adapter.send({ recipient: 'ana@fydy.ai', title: 'Hello', content: 'Body text' });

    expect(result.success).toBe(false);
    expect(result.error).toBe('connection refused');
  });

  it('should validate messages before sending', async () => {
    const adapter = new EmailNotificationAdapter(mailConfig, transport);

    const missingRecipient = await adapter.send({ recipient: '', title: 'Hello', content: 'Body' });
    const longTitle = await adapter.send({ recipient: 'ana@fydy.ai', title: 'x'.repeat(201), content: 'Body' });

    expect(missingRecipient.error).toBe('Notification recipient is required');
    expect(longTitle.error).toBe('Notification title too long (max 200 characters)');
    expect(transport.sent).toHaveLength(0);
  });

  it('should be unavailable without SMTP credentials', async () => {
    const adapter = new EmailNotificationAdapter({ ...mailConfig, smtpUser: '', smtpPass: '' });

    expect(await adapter.isAvailable()).toBe(false);
    const result = await adapter.send({ recipient: 'ana@fydy.ai', title: 'Hello', content: 'Body' });
    expect(result.success).toBe(false);
    expect(result.error).toBe('SMTP is not configured');
  });

  it('should build an SMTP transport when fully configured', () => {
    expect(EmailNotificationAdapter.createTransport(mailConfig)).not.toBeNull();
    expect(EmailNotificationAdapter.createTransport({ ...mailConfig, smtpHost: '' })).toBeNull();
  });
});
