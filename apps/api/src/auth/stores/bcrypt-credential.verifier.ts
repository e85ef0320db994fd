import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User } from '@authgate/database';
import type { CredentialVerifier } from '../interfaces';

/** Number of bcrypt salt rounds, matching the cost of stored hashes */
export const BCRYPT_SALT_ROUNDS = 12;

/**
 * CredentialVerifier that checks passwords against bcrypt hashes in the
 * `users` table.
 *
 * - Unknown usernames still pay for one bcrypt hash, so response time does
 *   not reveal which usernames exist
 * - Deactivated users are rejected like wrong passwords
 */
@Injectable()
export class BcryptCredentialVerifier implements CredentialVerifier {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async verify(username: string, password: string): Promise<string | null> {
    const user = await this.userRepository.findOne({
      where: { username },
      select: ['id', 'passwordHash', 'isActive'],
    });

    if (!user) {
      await bcrypt.hash(password, BCRYPT_SALT_ROUNDS);
      return null;
    }

    const isPasswordValid = await bcrypt.compare(password, user.passwordHash);
    if (!isPasswordValid || !user.isActive) {
      return null;
    }

    return user.id;
  }
}
