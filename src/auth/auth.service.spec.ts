import * as bcrypt from 'bcrypt';
import { UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { AuthService } from './auth.service';
import { UsersService } from '../user/user.service';
import { ConfigService } from '../config/config.service';
import { Role } from '../user/enums/role.enum';
import { User } from '../user/entities/user.entity';
import { Profile } from '../user/entities/profile.entity';

const passwordHash = bcrypt.hashSync('test-password', 4);

function account(overrides: Partial<User> = {}): User {
  const profile = Object.assign(new Profile(), {
    role: Role.TEACHER,
    phoneNumber: null,
    address: null,
    dateOfBirth: null,
  });
  return Object.assign(
    new User(),
    {
      id: 'u1',
      username: 'tutor',
      firstName: 'Tom',
      lastName: 'Tutor',
      email: 'tutor@example.com',
      password: passwordHash,
      isActive: true,
      lastLoginAt: null,
      profile,
    },
    overrides,
  );
}

describe('AuthService', () => {
  const jwtService = new JwtService({ secret: 'test-secret', signOptions: { expiresIn: '60m' } });
  const configService = new ConfigService({ NODE_ENV: 'test-nonexistent', JWT_REFRESH_SECRET: 'test-refresh-secret' });
  const usersService = {
    findByUsername: jest.fn(),
    findById: jest.fn(),
    updateLoginActivity: jest.fn(),
  };
  let service: AuthService;

  beforeEach(() => {
    jest.clearAllMocks();
    service = new AuthService(usersService as unknown as UsersService, jwtService, configService);
  });

  describe('validateUser', () => {
    it('accepts the right password', async () => {
      usersService.findByUsername.mockResolvedValueOnce(account());
      await expect(service.validateUser(' tutor ', 'test-password')).resolves.toMatchObject({ id: 'u1' });
      expect(usersService.findByUsername).toHaveBeenCalledWith('tutor');
    });

    it('rejects a wrong password', async () => {
      usersService.findByUsername.mockResolvedValueOnce(account());
      await expect(service.validateUser('tutor', 'wrong-password')).resolves.toBeNull();
    });

    it('rejects an inactive account', async () => {
      usersService.findByUsername.mockResolvedValueOnce(account({ isActive: false }));
      await expect(service.validateUser('tutor', 'test-password')).resolves.toBeNull();
    });

    it('rejects a blank username without a lookup', async () => {
      await expect(service.validateUser('   ', 'test-password')).resolves.toBeNull();
      expect(usersService.findByUsername).not.toHaveBeenCalled();
    });
  });

  describe('login', () => {
    it('issues an access and a refresh token signed with different secrets', async () => {
      const result = await service.login(account());

      expect(jwtService.verify(result.access_token)).toMatchObject({
        sub: 'u1',
        username: 'tutor',
        role: Role.TEACHER,
        type: 'access',
      });
      expect(() => jwtService.verify(result.refresh_token)).toThrow();
      expect(jwtService.verify(result.refresh_token, { secret: 'test-refresh-secret' })).toMatchObject({
        sub: 'u1',
        type: 'refresh',
      });
      expect(result.user).toMatchObject({ username: 'tutor', role: Role.TEACHER, fullName: 'Tom Tutor' });
      expect(usersService.updateLoginActivity).toHaveBeenCalledWith('u1', expect.any(Date));
    });
  });

  describe('refresh', () => {
    it('exchanges a refresh token for a new access token', async () => {
      const { refresh_token } = await service.login(account());
      usersService.findById.mockResolvedValueOnce(account());

      const { access_token } = await service.refresh(refresh_token);

      expect(jwtService.verify(access_token)).toMatchObject({ sub: 'u1', type: 'access' });
    });

    it('refuses an access token', async () => {
      const { access_token } = await service.login(account());
      await expect(service.refresh(access_token)).rejects.toBeInstanceOf(UnauthorizedException);
    });

    it('refuses a refresh token whose account was deactivated', async () => {
      const { refresh_token } = await service.login(account());
      usersService.findById.mockResolvedValueOnce(account({ isActive: false }));

      await expect(service.refresh(refresh_token)).rejects.toThrow('User inactive');
    });
  });
});
