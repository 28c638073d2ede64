import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User } from './entities/user.entity';
import { Profile } from './entities/profile.entity';
import { Role } from './enums/role.enum';
import { RegisterUserDto } from './dtos/register-user.dto';
import { ConvertToStudentDto, ConvertToTeacherDto } from './dtos/convert-user.dto';
import { ProfileDetail, toProfileDetail } from './user.mapper';
import { TeachersService } from '../teacher/teacher.service';
import { StudentsService } from '../student/student.service';
import { TeacherDetail, toTeacherDetail } from '../teacher/teacher.mapper';
import { StudentDetail, toStudentDetail } from '../student/student.mapper';
import { TeacherProfileFieldsDto } from '../teacher/dto/create-teacher.dto';
import { StudentProfileFieldsDto } from '../student/dto/create-student.dto';
import { Caller } from '../common/access/caller';
import { Action, Resource } from '../common/access/access-policy';
import { assertAccess } from '../common/access/assert-access';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';
import { SystemLoggingService } from '../logs/system-logging.service';

export const BCRYPT_ROUNDS = 10;

export interface RegisterResult {
  message: string;
  user: ProfileDetail;
}

export interface ConvertToTeacherResult {
  message: string;
  teacher: TeacherDetail;
}

export interface ConvertToStudentResult {
  message: string;
  student: StudentDetail;
}

function teacherFieldsOf(dto: RegisterUserDto): TeacherProfileFieldsDto {
  const { employeeId, department, qualification, hireDate } = dto;
  // Guaranteed by the role-conditional validators on RegisterUserDto
  if (!employeeId || !department || !qualification || !hireDate) {
    throw new FieldValidationException('role', 'Teacher fields are incomplete');
  }
  return {
    employeeId,
    department,
    qualification,
    hireDate,
    experienceYears: dto.experienceYears,
    specialization: dto.specialization,
    subjectIds: dto.subjectIds,
  };
}

function studentFieldsOf(dto: RegisterUserDto): StudentProfileFieldsDto {
  const { studentId, rollNumber, gender, guardianName, guardianPhone, admissionDate } = dto;
  if (!studentId || !rollNumber || !gender || !guardianName || !guardianPhone || !admissionDate) {
    throw new FieldValidationException('role', 'Student fields are incomplete');
  }
  return {
    studentId,
    rollNumber,
    gender,
    guardianName,
    guardianPhone,
    admissionDate,
    classId: dto.classId,
    guardianEmail: dto.guardianEmail,
    emergencyContact: dto.emergencyContact,
    bloodGroup: dto.bloodGroup,
    medicalConditions: dto.medicalConditions,
  };
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly dataSource: DataSource,
    private readonly teachersService: TeachersService,
    private readonly studentsService: StudentsService,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  async findByUsername(username: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { username }, relations: { profile: true } });
  }

  async findById(id: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { id }, relations: { profile: true } });
  }

  async updateLoginActivity(userId: string, loginAt: Date): Promise<void> {
    await this.userRepository.update(userId, { lastLoginAt: loginAt });
  }

  async findAll(caller: Caller): Promise<ProfileDetail[]> {
    assertAccess(caller, Resource.USER, Action.READ);
    const users = await this.userRepository.find({
      relations: { profile: true },
      order: { username: 'ASC' },
    });
    return users.map(toProfileDetail);
  }

  async findOne(caller: Caller, id: string): Promise<ProfileDetail> {
    assertAccess(caller, Resource.USER, Action.READ);
    const user = await this.findById(id);
    if (!user) {
      throw new NotFoundException(`User with ID ${id} not found`);
    }
    return toProfileDetail(user);
  }

  /**
   * Creates the account, its profile and the role's Teacher/Student row in a
   * single transaction.
   */
  async register(caller: Caller, dto: RegisterUserDto): Promise<RegisterResult> {
    assertAccess(caller, Resource.USER, Action.WRITE);

    if (dto.password !== dto.passwordConfirm) {
      throw new FieldValidationException('passwordConfirm', "Password fields didn't match.");
    }

    const user = await this.dataSource.transaction(async (manager) => {
      const taken = await manager.findOne(User, { where: { username: dto.username } });
      if (taken) {
        throw new FieldValidationException('username', 'A user with that username already exists.');
      }

      const account = await this.createAccount(manager, dto);
      if (dto.role === Role.TEACHER) {
        await this.teachersService.createInTransaction(manager, account, teacherFieldsOf(dto));
      } else if (dto.role === Role.STUDENT) {
        await this.studentsService.createInTransaction(manager, account, studentFieldsOf(dto));
      }
      return account;
    });

    this.logger.log(`Registered ${user.username} as ${dto.role}`);
    await this.systemLoggingService.logAccountRegistered(user.id, dto.role, caller);
    return { message: 'User registered successfully', user: toProfileDetail(user) };
  }

  private async createAccount(manager: EntityManager, dto: RegisterUserDto): Promise<User> {
    const password = await bcrypt.hash(dto.password, BCRYPT_ROUNDS);
    const user = await manager.save(
      manager.create(User, {
        username: dto.username,
        email: dto.email,
        firstName: dto.firstName,
        lastName: dto.lastName,
        password,
        isActive: true,
      }),
    );
    user.profile = await manager.save(
      manager.create(Profile, {
        userId: user.id,
        role: dto.role,
        phoneNumber: dto.phoneNumber ?? null,
        address: dto.address ?? null,
        dateOfBirth: dto.dateOfBirth ?? null,
      }),
    );
    return user;
  }

  /** Loads the account being converted and points its profile at the new role. */
  private async switchRole(manager: EntityManager, userId: string, role: Role): Promise<User> {
    const user = await manager.findOne(User, { where: { id: userId }, relations: { profile: true } });
    if (!user) {
      throw new FieldValidationException('userId', 'User not found');
    }

    const profile = user.profile ?? manager.create(Profile, { userId: user.id });
    profile.role = role;
    user.profile = await manager.save(profile);
    return user;
  }

  async convertToTeacher(caller: Caller, dto: ConvertToTeacherDto): Promise<ConvertToTeacherResult> {
    assertAccess(caller, Resource.USER, Action.WRITE);

    const teacher = await this.dataSource.transaction(async (manager) => {
      const user = await this.switchRole(manager, dto.userId, Role.TEACHER);
      return this.teachersService.createInTransaction(manager, user, dto);
    });

    await this.systemLoggingService.logRoleConverted(dto.userId, Role.TEACHER, teacher.id, caller);
    return { message: 'User successfully converted to teacher', teacher: toTeacherDetail(teacher) };
  }

  async convertToStudent(caller: Caller, dto: ConvertToStudentDto): Promise<ConvertToStudentResult> {
    assertAccess(caller, Resource.USER, Action.WRITE);

    const student = await this.dataSource.transaction(async (manager) => {
      const user = await this.switchRole(manager, dto.userId, Role.STUDENT);
      return this.studentsService.createInTransaction(manager, user, dto);
    });

    await this.systemLoggingService.logRoleConverted(dto.userId, Role.STUDENT, student.id, caller);
    return { message: 'User successfully converted to student', student: toStudentDetail(student) };
  }
}
