import { JwtService } from '@nestjs/jwt';
import { DataSource } from 'typeorm';
import { UnauthenticatedError, ValidationError } from '../common/errors';
import { User } from '../database/entities';
import { RecordingDelivery } from '../../test/utils/recording-delivery';
import { createTestStorage, seedUser, testConfig } from '../../test/utils/test-database';
import { ConfirmationCodeService, generateConfirmationCode } from './confirmation-code.service';
import { TokenService } from './token.service';

describe('generateConfirmationCode', () => {
  it('produces url-safe codes that differ between calls', () => {
    const first = generateConfirmationCode();
    const second = generateConfirmationCode();

    expect(first).toMatch(/^[A-Za-z0-9_-]{16}$/);
    expect(second).not.toBe(first);
  });
});

describe('ConfirmationCodeService', () => {
  let dataSource: DataSource;
  let delivery: RecordingDelivery;
  let tokens: TokenService;
  let service: ConfirmationCodeService;
  let user: User;

  const stored = () => dataSource.getRepository(User).findOneByOrFail({ id: user.id });

  beforeEach(async () => {
    const storage = await createTestStorage();
    dataSource = storage.dataSource;
    delivery = new RecordingDelivery();
    tokens = new TokenService(new JwtService({ secret: 'test-secret' }));
    service = new ConfirmationCodeService(storage.unitOfWork, delivery, tokens, testConfig);
    user = await seedUser(dataSource, 'carol', 'moderator');
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('stores and delivers a code for a matching email and username', async () => {
    const code = await service.issueCode('carol@example.test', 'carol');

    expect(delivery.sent).toEqual([{ email: 'carol@example.test', code }]);
    const record = await stored();
    expect(record.confirmationCode).toBe(code);
    expect(record.confirmationCodeExpiresAt?.getTime()).toBeGreaterThan(Date.now());
  });

  it('refuses to issue a code when email and username do not belong together', async () => {
    await expect(service.issueCode('someone@example.test', 'carol')).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(service.issueCode('carol@example.test', 'nobody')).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(delivery.sent).toEqual([]);
  });

  it('exchanges a code for a token carrying the user and role', async () => {
    const code = await service.issueCode('carol@example.test', 'carol');

    const token = await service.exchange('carol', code);

    await expect(tokens.verify(token)).resolves.toEqual({ userId: user.id, role: 'moderator' });
  });

  it('accepts a code only once', async () => {
    const code = await service.issueCode('carol@example.test', 'carol');
    await service.exchange('carol', code);

    await expect(service.exchange('carol', code)).rejects.toBeInstanceOf(UnauthenticatedError);
    expect((await stored()).confirmationCode).toBeNull();
  });

  it('keeps the code after a wrong guess', async () => {
    const code = await service.issueCode('carol@example.test', 'carol');

    await expect(service.exchange('carol', 'wrong-code')).rejects.toBeInstanceOf(
      UnauthenticatedError,
    );
    await expect(service.exchange('carol', code)).resolves.toEqual(expect.any(String));
  });

  it('rejects an expired code', async () => {
    const code = await service.issueCode('carol@example.test', 'carol');
    await dataSource
      .getRepository(User)
      .update({ id: user.id }, { confirmationCodeExpiresAt: new Date(Date.now() - 1000) });

    await expect(service.exchange('carol', code)).rejects.toBeInstanceOf(UnauthenticatedError);
  });

  it('invalidates the previous code when a new one is issued', async () => {
    const first = await service.issueCode('carol@example.test', 'carol');
    const second = await service.issueCode('carol@example.test', 'carol');

    await expect(service.exchange('carol', first)).rejects.toBeInstanceOf(UnauthenticatedError);
    await expect(service.exchange('carol', second)).resolves.toEqual(expect.any(String));
  });

  it('rejects users that never received a code', async () => {
    await expect(service.exchange('carol', 'anything')).rejects.toBeInstanceOf(
      UnauthenticatedError,
    );
    await expect(service.exchange('ghost', 'anything')).rejects.toBeInstanceOf(
      UnauthenticatedError,
    );
  });

  it('keeps the stored code when delivery fails', async () => {
    delivery.failWith = new Error('smtp down');

    const code = await service.issueCode('carol@example.test', 'carol');

    expect((await stored()).confirmationCode).toBe(code);
  });
});
