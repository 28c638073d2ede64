import 'reflect-metadata';
import * as bcrypt from 'bcrypt';
import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { dataSourceOptions } from '../database/data-source';
import { User } from '../user/entities/user.entity';
import { Profile } from '../user/entities/profile.entity';
import { Role } from '../user/enums/role.enum';
import { BCRYPT_ROUNDS } from '../user/user.service';

const logger = new Logger('CreateAdmin');

async function main(): Promise<void> {
  const configService = new ConfigService();
  const username = configService.get('ADMIN_USERNAME');
  const email = configService.get('ADMIN_EMAIL');
  const password = configService.get('ADMIN_PASSWORD');

  const dataSource = await new DataSource(dataSourceOptions(configService)).initialize();
  try {
    const existing = await dataSource.getRepository(User).findOne({ where: { username } });
    if (existing) {
      logger.log(`Account ${username} already exists (${existing.id})`);
      return;
    }

    const admin = await dataSource.transaction(async (manager) => {
      const user = await manager.save(
        manager.create(User, {
          username,
          email,
          firstName: 'System',
          lastName: 'Administrator',
          password: await bcrypt.hash(password, BCRYPT_ROUNDS),
          isActive: true,
        }),
      );
      await manager.save(manager.create(Profile, { userId: user.id, role: Role.ADMIN }));
      return user;
    });
    logger.log(`Created admin ${admin.username} (${admin.id})`);
  } finally {
    await dataSource.destroy();
  }
}

main().catch((err: unknown) => {
  logger.error(`Failed to create admin: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
