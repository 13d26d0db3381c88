import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { OTP_CONFIG, OtpConfig } from '../../common/config/otp.config';
import {
  DeliveryResult,
  MESSAGE_DELIVERY,
  MessageDelivery,
} from '../whatsapp/interfaces/whatsapp-messaging.interface';
import { OtpService } from './otp.service';
import { InMemoryOtpStorage } from './storage/in-memory-otp.storage';
import { OTP_STORAGE, OtpStorage } from './storage/otp-storage.interface';
import { selectOtpStorage } from './storage/otp-storage.selector';

const PHONE = '7888888888';
const CANONICAL = '+917888888888';

class RecordingDelivery implements MessageDelivery {
  calls: Array<{ phoneNumber: string; templateId: string; params: string[] }> =
    [];
  result: DeliveryResult = { success: true, messageId: 'msg-1' };

  async deliverTemplate(
    phoneNumber: string,
    templateId: string,
    params: string[],
  ): Promise<DeliveryResult> {
    this.calls.push({ phoneNumber, templateId, params });
    return this.result;
  }
}

const baseConfig: OtpConfig = {
  ttlMinutes: 3,
  templateId: 'otp-template',
  blockDuplicateSend: false,
  exposeCode: false,
};

async function createService(
  storage: OtpStorage,
  delivery: MessageDelivery,
  config: Partial<OtpConfig> = {},
): Promise<OtpService> {
  const moduleRef = await Test.createTestingModule({
    providers: [
      OtpService,
      { provide: OTP_STORAGE, useValue: storage },
      { provide: MESSAGE_DELIVERY, useValue: delivery },
      { provide: OTP_CONFIG, useValue: { ...baseConfig, ...config } },
    ],
  }).compile();

  return moduleRef.get(OtpService);
}

async function activeCode(storage: OtpStorage): Promise<string> {
  const record = await storage.getActive(CANONICAL);
  if (!record) throw new Error('expected an active OTP');
  return record.code;
}

describe('OtpService', () => {
  let storage: InMemoryOtpStorage;
  let delivery: RecordingDelivery;
  let service: OtpService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    storage = new InMemoryOtpStorage();
    delivery = new RecordingDelivery();
    service = await createService(storage, delivery);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('send', () => {
    it('stores the code and delivers it through the OTP template', async () => {
      const result = await service.send(PHONE);

      expect(result).toEqual({
        success: true,
        message: 'OTP sent successfully',
        data: { phone_number: CANONICAL },
      });

      const code = await activeCode(storage);
      expect(code).toMatch(/^\d{6}$/);
      expect(delivery.calls).toEqual([
        { phoneNumber: CANONICAL, templateId: 'otp-template', params: [code] },
      ]);
    });

    it('sets the expiry TTL minutes ahead', async () => {
      const before = Date.now();
      await service.send(PHONE);
      const after = Date.now();

      const record = await storage.getActive(CANONICAL);
      const expiresAt = record?.expiresAt.getTime() ?? 0;
      expect(expiresAt).toBeGreaterThanOrEqual(before + 3 * 60_000);
      expect(expiresAt).toBeLessThanOrEqual(after + 3 * 60_000);
    });

    it('rejects an invalid phone without touching storage or delivery', async () => {
      const result = await service.send('12345');

      expect(result).toEqual({
        success: false,
        message: 'Invalid phone number format',
        error: 'INVALID_PHONE_NUMBER',
        data: { phone_number: '12345' },
      });
      expect(delivery.calls).toEqual([]);
      expect(await storage.history('+9112345')).toEqual([]);
    });

    it('keeps the record when delivery fails', async () => {
      delivery.result = {
        success: false,
        error: 'Failed to send message. Status: 401',
      };

      const result = await service.send(PHONE);

      expect(result).toEqual({
        success: false,
        message: 'Failed to send message. Status: 401',
        error: 'DELIVERY_FAILED',
        data: { phone_number: CANONICAL },
      });
      expect(await storage.getActive(CANONICAL)).not.toBeNull();
    });

    it('echoes the code only when exposeCode is enabled', async () => {
      service = await createService(storage, delivery, { exposeCode: true });
      jest.spyOn(service, 'generateCode').mockReturnValue('482913');

      const result = await service.send(PHONE);

      expect(result.data).toEqual({ phone_number: CANONICAL, code: '482913' });
    });

    it('blocks a second send while the code is live when configured to', async () => {
      service = await createService(storage, delivery, {
        blockDuplicateSend: true,
      });

      await service.send(PHONE);
      const second = await service.send(PHONE);

      expect(second).toEqual({
        success: false,
        message:
          'OTP already sent. Please wait for expiry or use resend endpoint.',
        error: 'OTP_ALREADY_SENT',
        data: { phone_number: CANONICAL },
      });
      expect(delivery.calls).toHaveLength(1);

      const resent = await service.resend(PHONE);
      expect(resent.success).toBe(true);
    });

    it('reports unexpected storage errors as STORAGE_UNAVAILABLE', async () => {
      jest.spyOn(storage, 'put').mockRejectedValue(new Error('boom'));

      const result = await service.send(PHONE);

      expect(result).toEqual({
        success: false,
        message: 'OTP storage error: boom',
        error: 'STORAGE_UNAVAILABLE',
        data: { phone_number: CANONICAL },
      });
      expect(delivery.calls).toEqual([]);
    });
  });

  describe('verify', () => {
    it('accepts the code once, then reports it as not found', async () => {
      await service.send(PHONE);
      const code = await activeCode(storage);

      const first = await service.verify(PHONE, code);
      const second = await service.verify(PHONE, code);

      expect(first).toEqual({
        success: true,
        message: 'OTP verified successfully',
        data: { phone_number: CANONICAL },
      });
      expect(second).toEqual({
        success: false,
        message: 'OTP not found or expired',
        error: 'NOT_FOUND',
        data: { phone_number: CANONICAL },
      });
    });

    it('matches the record whatever format the phone is written in', async () => {
      await service.send('+91 78888 88888');
      const code = await activeCode(storage);

      const result = await service.verify('91-788-888-8888', code);

      expect(result.success).toBe(true);
    });

    it('reports NOT_FOUND when nothing was sent', async () => {
      const result = await service.verify(PHONE, '123456');

      expect(result).toMatchObject({ success: false, error: 'NOT_FOUND' });
    });

    it('rejects an expired code and marks it used', async () => {
      await storage.put(CANONICAL, '123456', new Date(Date.now() - 1_000));

      const result = await service.verify(PHONE, '123456');

      expect(result).toEqual({
        success: false,
        message: 'OTP not found or expired',
        error: 'NOT_FOUND',
        data: { phone_number: CANONICAL },
      });
      const [record] = await storage.history(CANONICAL);
      expect(record.isUsed).toBe(true);
    });

    it('leaves the record untouched on a wrong code', async () => {
      jest.spyOn(service, 'generateCode').mockReturnValue('482913');
      await service.send(PHONE);

      const wrong = await service.verify(PHONE, '000000');
      const right = await service.verify(PHONE, '482913');

      expect(wrong).toEqual({
        success: false,
        message: 'Invalid OTP',
        error: 'INVALID_OTP',
        data: { phone_number: CANONICAL },
      });
      expect(right.success).toBe(true);
    });

    it.each([['12345'], ['1234567'], ['12ab56'], ['']])(
      'rejects the malformed code %p',
      async (code) => {
        await service.send(PHONE);

        const result = await service.verify(PHONE, code);

        expect(result).toMatchObject({
          success: false,
          error: 'INVALID_OTP_FORMAT',
          message: 'OTP must be a 6 digit code',
        });
        expect(await storage.getActive(CANONICAL)).not.toBeNull();
      },
    );

    it('rejects an invalid phone', async () => {
      const result = await service.verify('+910888888888', '123456');

      expect(result).toMatchObject({
        success: false,
        error: 'INVALID_PHONE_NUMBER',
      });
    });
  });

  describe('resend', () => {
    it('supersedes the earlier code', async () => {
      jest
        .spyOn(service, 'generateCode')
        .mockReturnValueOnce('111111')
        .mockReturnValueOnce('222222');

      await service.send(PHONE);
      const resent = await service.resend(PHONE);

      expect(resent).toEqual({
        success: true,
        message: 'OTP resent successfully',
        data: { phone_number: CANONICAL },
      });
      expect((await service.verify(PHONE, '111111')).success).toBe(false);
      expect((await service.verify(PHONE, '222222')).success).toBe(true);
      expect(await service.verify(PHONE, '111111')).toMatchObject({
        error: 'NOT_FOUND',
      });
      expect((await storage.history(CANONICAL)).map((r) => r.code)).toEqual([
        '111111',
        '222222',
      ]);
    });

    it('works without a previous send', async () => {
      const result = await service.resend(PHONE);

      expect(result.success).toBe(true);
      expect(delivery.calls).toHaveLength(1);
    });
  });

  it('runs the whole lifecycle on the fallback store picked at startup', async () => {
    const fallback = await selectOtpStorage({
      primaryConfigured: true,
      primaryFactory: async () => {
        throw new Error('connection refused');
      },
      logger: new Logger('test'),
    });
    service = await createService(fallback, delivery);
    jest.spyOn(service, 'generateCode').mockReturnValue('654321');

    expect(service.storageBackend).toBe('memory');
    expect((await service.send(PHONE)).success).toBe(true);
    expect((await service.verify(PHONE, '654321')).success).toBe(true);
    expect((await service.verify(PHONE, '654321')).success).toBe(false);
  });

  it('leaves the record used after two concurrent verifications', async () => {
    jest.spyOn(service, 'generateCode').mockReturnValue('482913');
    await service.send(PHONE);

    const results = await Promise.all([
      service.verify(PHONE, '482913'),
      service.verify(PHONE, '482913'),
    ]);

    expect(results.some((result) => result.success)).toBe(true);
    const history = await storage.history(CANONICAL);
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ code: '482913', isUsed: true });
    expect(await service.verify(PHONE, '482913')).toMatchObject({
      error: 'NOT_FOUND',
    });
  });

  it('consumes the verified code when a resend lands during verification', async () => {
    jest
      .spyOn(service, 'generateCode')
      .mockReturnValueOnce('111111')
      .mockReturnValueOnce('222222');
    await service.send(PHONE);

    const [verified, resent] = await Promise.all([
      service.verify(PHONE, '111111'),
      service.resend(PHONE),
    ]);

    expect(verified.success).toBe(true);
    expect(resent.success).toBe(true);
    expect(
      (await storage.history(CANONICAL)).map((r) => [r.code, r.isUsed]),
    ).toEqual([
      ['111111', true],
      ['222222', false],
    ]);
    expect((await service.verify(PHONE, '222222')).success).toBe(true);
  });

  it('stamps creation and expiry from the same clock', async () => {
    const issuedAt = new Date('2026-01-01T10:00:00.000Z');

    class FixedClockOtpService extends OtpService {
      protected now(): Date {
        return new Date(issuedAt);
      }
    }

    const fixed = new FixedClockOtpService(storage, delivery, baseConfig);
    await fixed.send(PHONE);

    const [record] = await storage.history(CANONICAL);
    expect(record.createdAt).toEqual(issuedAt);
    expect(record.expiresAt).toEqual(new Date('2026-01-01T10:03:00.000Z'));
  });

  it('never writes the code to the logs', async () => {
    const spies = (['log', 'error', 'warn', 'debug'] as const).map((method) =>
      jest.spyOn(Logger.prototype, method),
    );
    jest.spyOn(service, 'generateCode').mockReturnValue('482913');

    await service.send(PHONE);
    await service.verify(PHONE, '000000');
    await service.verify(PHONE, '482913');
    delivery.result = { success: false, error: 'Gupshup is not configured' };
    await service.resend(PHONE);

    const logged = spies.flatMap((spy) => spy.mock.calls.flat().map(String));
    expect(logged.length).toBeGreaterThan(0);
    expect(logged.filter((line) => line.includes('482913'))).toEqual([]);
  });

  it('generates six digit codes between 100000 and 999999', () => {
    for (let i = 0; i < 200; i += 1) {
      const code = Number(service.generateCode());
      expect(code).toBeGreaterThanOrEqual(100000);
      expect(code).toBeLessThanOrEqual(999999);
    }
  });
});
