import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import * as bcrypt from 'bcrypt';
import { User } from '@authgate/database';
import { BcryptCredentialVerifier } from './bcrypt-credential.verifier';

const USER_ID = '3f2b9c1e-8d4a-4b6f-9a2e-1c5d7e9f0a3b';

describe('BcryptCredentialVerifier', () => {
  let verifier: BcryptCredentialVerifier;
  const userRepository = { findOne: jest.fn() };
  // Low cost keeps the suite fast; compare() reads the cost from the hash
  const passwordHash = bcrypt.hashSync('test-password', 4);

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        BcryptCredentialVerifier,
        { provide: getRepositoryToken(User), useValue: userRepository },
      ],
    }).compile();
    verifier = moduleRef.get(BcryptCredentialVerifier);
  });

  it('returns the user id for a matching password', async () => {
    userRepository.findOne.mockResolvedValue({
      id: USER_ID,
      passwordHash,
      isActive: true,
    });

    await expect(verifier.verify('alice', 'test-password')).resolves.toBe(USER_ID);
    expect(userRepository.findOne).toHaveBeenCalledWith({
      where: { username: 'alice' },
      select: ['id', 'passwordHash', 'isActive'],
    });
  });

  it('returns null for a wrong password', async () => {
    userRepository.findOne.mockResolvedValue({
      id: USER_ID,
      passwordHash,
      isActive: true,
    });

    await expect(verifier.verify('alice', 'wrong-password')).resolves.toBeNull();
  });

  it('returns null for a deactivated user', async () => {
    userRepository.findOne.mockResolvedValue({
      id: USER_ID,
      passwordHash,
      isActive: false,
    });

    await expect(verifier.verify('alice', 'test-password')).resolves.toBeNull();
  });

  it('returns null for an unknown username', async () => {
    userRepository.findOne.mockResolvedValue(null);

    await expect(verifier.verify('nobody', 'test-password')).resolves.toBeNull();
  });
});
