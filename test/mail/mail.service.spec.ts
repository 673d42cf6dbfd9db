import { MailService } from '../../src/modules/mail/mail.service';
import { TemplateService } from '../../src/modules/mail/services/template.service';
import { createTestConfig } from '../support/test-config';

const mockSendMail = jest.fn();
const mockVerify = jest.fn();

jest.mock('nodemailer', () => ({
    createTransport: jest.fn(() => ({ sendMail: mockSendMail, verify: mockVerify })),
}));

describe('MailService', () => {
    let templateService: TemplateService;

    beforeAll(async () => {
        templateService = new TemplateService(createTestConfig());
        await templateService.onModuleInit();
    });

    beforeEach(() => {
        mockSendMail.mockReset();
        mockVerify.mockReset();
    });

    it('renders the template and derives a text part', async () => {
        mockSendMail.mockResolvedValue({ messageId: 'm-1' });
        const service = new MailService(createTestConfig(), templateService);

        await expect(
            service.sendMail({
                to: 'jane.doe@example.com',
                subject: 'Account Locked Notification',
                template: 'account-locked',
                context: { name: 'jane' },
            }),
        ).resolves.toBe(true);

        expect(mockSendMail).toHaveBeenCalledWith({
            from: 'no-reply@example.com',
            to: 'jane.doe@example.com',
            subject: 'Account Locked Notification',
            html: expect.stringContaining('<p>Hello Jane,</p>'),
            text: expect.stringContaining('Your User Accounts account is locked Hello Jane,'),
        });
    });

    it('sends raw content as given', async () => {
        mockSendMail.mockResolvedValue({ messageId: 'm-2' });
        const service = new MailService(createTestConfig(), templateService);

        await service.sendMail({
            to: 'jane.doe@example.com',
            subject: 'Hello',
            html: '<p>Hi</p>',
            text: 'Hi',
        });

        expect(mockSendMail).toHaveBeenCalledWith({
            from: 'no-reply@example.com',
            to: 'jane.doe@example.com',
            subject: 'Hello',
            html: '<p>Hi</p>',
            text: 'Hi',
        });
    });

    it('reports transport failures as false', async () => {
        mockSendMail.mockRejectedValue(new Error('connection refused'));
        const service = new MailService(createTestConfig(), templateService);

        await expect(
            service.sendMail({ to: 'jane.doe@example.com', subject: 'Hello', text: 'Hi' }),
        ).resolves.toBe(false);
    });

    it('reports unknown templates as false without sending', async () => {
        const service = new MailService(createTestConfig(), templateService);

        await expect(
            service.sendMail({ to: 'jane.doe@example.com', subject: 'Hello', template: 'missing' }),
        ).resolves.toBe(false);
        expect(mockSendMail).not.toHaveBeenCalled();
    });

    it('checks the SMTP connection in development only', async () => {
        mockVerify.mockRejectedValue(new Error('unreachable'));

        await new MailService(createTestConfig({ nodeEnv: 'test' }), templateService).onModuleInit();
        expect(mockVerify).not.toHaveBeenCalled();

        await expect(
            new MailService(createTestConfig({ nodeEnv: 'development' }), templateService).onModuleInit(),
        ).resolves.toBeUndefined();
        expect(mockVerify).toHaveBeenCalledTimes(1);
    });
});
