import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { isUUID } from 'class-validator';
import { User } from '@authgate/database';
import type { Principal, UserStore } from '../interfaces';

/**
 * UserStore backed by the `users` table.
 *
 * Re-checked on every request because tokens are stateless: a user deleted
 * or deactivated after issuance must stop resolving immediately.
 */
@Injectable()
export class TypeOrmUserStore implements UserStore {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async findById(subjectId: string): Promise<Principal | null> {
    // Postgres rejects non-UUID input for a uuid column
    if (!isUUID(subjectId)) {
      return null;
    }

    const user = await this.userRepository.findOne({
      where: { id: subjectId },
      select: ['id', 'username', 'isActive'],
    });

    if (!user || !user.isActive) {
      return null;
    }

    return { id: user.id, username: user.username };
  }
}
