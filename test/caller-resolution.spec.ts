import { UnauthorizedException } from '@nestjs/common';
import { Repository } from 'typeorm';
import { CallerService } from '../src/auth/caller.service';
import { JwtStrategy } from '../src/auth/jwt.strategy';
import { ConfigService } from '../src/config/config.service';
import { User } from '../src/user/entities/user.entity';
import { Teacher } from '../src/teacher/entities/teacher.entity';
import { Student } from '../src/student/entities/student.entity';
import { Class } from '../src/classes/entity/class.entity';
import { Role } from '../src/user/enums/role.enum';
import { Action, Resource, canAccess } from '../src/common/access/access-policy';

describe('resolving the caller behind an access token', () => {
  const userRepo = { findOne: jest.fn() };
  const teacherRepo = { findOne: jest.fn() };
  const studentRepo = { findOne: jest.fn() };
  const classRepo = { find: jest.fn() };
  const callerService = new CallerService(
    userRepo as unknown as Repository<User>,
    teacherRepo as unknown as Repository<Teacher>,
    studentRepo as unknown as Repository<Student>,
    classRepo as unknown as Repository<Class>,
  );
  const strategy = new JwtStrategy(callerService, new ConfigService({ NODE_ENV: 'test-nonexistent', JWT_SECRET: 'test-secret' }));
  const accessPayload = { sub: 'u1', username: 'tutor', role: Role.TEACHER, type: 'access' };

  beforeEach(() => {
    jest.resetAllMocks();
  });

  it('carries the teacher profile and its classes into the access policy', async () => {
    userRepo.findOne.mockResolvedValueOnce({ id: 'u1', username: 'tutor', isActive: true, profile: { role: Role.TEACHER } });
    teacherRepo.findOne.mockResolvedValueOnce({ id: 't1', isActive: true });
    classRepo.find.mockResolvedValueOnce([{ id: 'c1' }, { id: 'c2' }]);

    const caller = await strategy.validate(accessPayload);

    expect(caller).toEqual({
      userId: 'u1',
      username: 'tutor',
      role: Role.TEACHER,
      teacher: { id: 't1', classIds: ['c1', 'c2'] },
    });
    expect(canAccess(caller, Resource.STUDENT, Action.WRITE, { classId: 'c2' })).toBe(true);
    expect(canAccess(caller, Resource.STUDENT, Action.WRITE, { classId: 'c3' })).toBe(false);
  });

  it('takes the role from the stored profile, not the token', async () => {
    userRepo.findOne.mockResolvedValueOnce({ id: 'u1', username: 'tutor', isActive: true, profile: { role: Role.STAFF } });

    await expect(strategy.validate(accessPayload)).resolves.toEqual({
      userId: 'u1',
      username: 'tutor',
      role: Role.STAFF,
    });
  });

  it('leaves a deactivated student profile unlinked, which denies everything', async () => {
    userRepo.findOne.mockResolvedValueOnce({ id: 'u2', username: 'pupil', isActive: true, profile: { role: Role.STUDENT } });
    studentRepo.findOne.mockResolvedValueOnce({ id: 's1', classId: 'c1', isActive: false });

    const caller = await strategy.validate({ ...accessPayload, sub: 'u2', username: 'pupil', role: Role.STUDENT });

    expect(caller).toMatchObject({ role: Role.STUDENT, student: null });
    expect(canAccess(caller, Resource.SUBJECT, Action.READ)).toBe(false);
  });

  it('rejects a deactivated account', async () => {
    userRepo.findOne.mockResolvedValueOnce({ id: 'u1', username: 'tutor', isActive: false, profile: null });

    await expect(strategy.validate(accessPayload)).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('rejects a refresh token presented as an access token', async () => {
    await expect(strategy.validate({ ...accessPayload, type: 'refresh' })).rejects.toThrow('Invalid token');
    expect(userRepo.findOne).not.toHaveBeenCalled();
  });
});
