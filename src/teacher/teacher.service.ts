import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository, SelectQueryBuilder } from 'typeorm';
import { Teacher } from './entities/teacher.entity';
import { User } from '../user/entities/user.entity';
import { Class } from '../classes/entity/class.entity';
import { Student } from '../student/entities/student.entity';
import { CreateTeacherDto, TeacherProfileFieldsDto } from './dto/create-teacher.dto';
import { UpdateTeacherDto } from './dto/update-teacher.dto';
import { ListQueryDto } from '../common/dto/list-query.dto';
import { TeacherDetail, TeacherListItem, toTeacherDetail, toTeacherListItem } from './teacher.mapper';
import { ClassDetail, toClassDetail } from '../classes/class.mapper';
import { StudentListItem, toStudentListItem } from '../student/student.mapper';
import { Caller } from '../common/access/caller';
import { AccessFacts, Action, Resource, scopeFor } from '../common/access/access-policy';
import { assertAccess } from '../common/access/assert-access';
import { applyScope } from '../common/access/scope-query';
import {
  CLASS_SCOPE_COLUMNS,
  STUDENT_SCOPE_COLUMNS,
  TEACHER_SCOPE_COLUMNS,
} from '../common/access/scope-columns';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';
import { findSubjectsOrFail } from '../subject/subject-references';
import { SystemLoggingService } from '../logs/system-logging.service';

function teacherFacts(teacher: Pick<Teacher, 'id' | 'userId'>): AccessFacts {
  return { teacherId: teacher.id, userId: teacher.userId };
}

@Injectable()
export class TeachersService {
  private readonly logger = new Logger(TeachersService.name);

  constructor(
    @InjectRepository(Teacher)
    private readonly teacherRepository: Repository<Teacher>,
    @InjectRepository(Class)
    private readonly classRepository: Repository<Class>,
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    private readonly dataSource: DataSource,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  private scoped(caller: Caller): SelectQueryBuilder<Teacher> | null {
    const qb = this.teacherRepository
      .createQueryBuilder('teacher')
      .leftJoinAndSelect('teacher.user', 'user')
      .leftJoinAndSelect('teacher.subjects', 'subject');
    return applyScope(qb, scopeFor(caller, Resource.TEACHER), TEACHER_SCOPE_COLUMNS) ? qb : null;
  }

  async findAll(caller: Caller, query: ListQueryDto = {}): Promise<TeacherListItem[]> {
    const qb = this.scoped(caller);
    if (!qb) return [];

    if (!query.includeInactive) {
      qb.andWhere('teacher.isActive = :active', { active: true });
    }
    if (query.search) {
      qb.andWhere(
        '(user.firstName ILIKE :search OR user.lastName ILIKE :search OR teacher.employeeId ILIKE :search OR teacher.department ILIKE :search)',
        { search: `%${query.search}%` },
      );
    }

    const teachers = await qb.orderBy('teacher.employeeId', 'ASC').getMany();
    return teachers.map(toTeacherListItem);
  }

  private async findScoped(caller: Caller, id: string): Promise<Teacher> {
    const qb = this.scoped(caller);
    const teacher = qb ? await qb.andWhere('teacher.id = :id', { id }).getOne() : null;
    if (!teacher) {
      throw new NotFoundException(`Teacher with ID ${id} not found`);
    }
    return teacher;
  }

  async findOne(caller: Caller, id: string): Promise<TeacherDetail> {
    return toTeacherDetail(await this.findScoped(caller, id));
  }

  /**
   * Creates the Teacher row for an existing account inside the given
   * transaction. Shared by the teacher endpoint, registration and conversion.
   */
  async createInTransaction(
    manager: EntityManager,
    user: User,
    fields: TeacherProfileFieldsDto,
    isActive = true,
  ): Promise<Teacher> {
    const [existing, duplicate] = await Promise.all([
      manager.findOne(Teacher, { where: { userId: user.id } }),
      manager.findOne(Teacher, { where: { employeeId: fields.employeeId } }),
    ]);
    if (existing) {
      throw new FieldValidationException('userId', 'This user already has a teacher profile');
    }
    if (duplicate) {
      throw new FieldValidationException('employeeId', 'A teacher with this employee id already exists');
    }

    const subjects = await findSubjectsOrFail(manager, fields.subjectIds);
    const teacher = manager.create(Teacher, {
      userId: user.id,
      employeeId: fields.employeeId,
      department: fields.department,
      qualification: fields.qualification,
      experienceYears: fields.experienceYears ?? 0,
      specialization: fields.specialization ?? null,
      hireDate: fields.hireDate,
      isActive,
      subjects,
    });
    const saved = await manager.save(teacher);
    saved.user = user;
    return saved;
  }

  async create(caller: Caller, dto: CreateTeacherDto): Promise<TeacherDetail> {
    assertAccess(caller, Resource.TEACHER, Action.WRITE, {});

    const teacher = await this.dataSource.transaction(async (manager) => {
      const user = await manager.findOne(User, { where: { id: dto.userId } });
      if (!user) {
        throw new FieldValidationException('userId', 'User not found');
      }
      return this.createInTransaction(manager, user, dto, dto.isActive ?? true);
    });

    this.logger.log(`Teacher ${teacher.employeeId} created by ${caller.username}`);
    return toTeacherDetail(teacher);
  }

  async update(caller: Caller, id: string, dto: UpdateTeacherDto): Promise<TeacherDetail> {
    const teacher = await this.findScoped(caller, id);
    assertAccess(caller, Resource.TEACHER, Action.WRITE, teacherFacts(teacher));

    if (dto.employeeId !== undefined && dto.employeeId !== teacher.employeeId) {
      const duplicate = await this.teacherRepository.findOne({ where: { employeeId: dto.employeeId } });
      if (duplicate) {
        throw new FieldValidationException('employeeId', 'A teacher with this employee id already exists');
      }
      teacher.employeeId = dto.employeeId;
    }
    if (dto.department !== undefined) teacher.department = dto.department;
    if (dto.qualification !== undefined) teacher.qualification = dto.qualification;
    if (dto.experienceYears !== undefined) teacher.experienceYears = dto.experienceYears;
    if (dto.specialization !== undefined) teacher.specialization = dto.specialization;
    if (dto.hireDate !== undefined) teacher.hireDate = dto.hireDate;
    if (dto.isActive !== undefined) teacher.isActive = dto.isActive;
    if (dto.subjectIds !== undefined) {
      teacher.subjects = await findSubjectsOrFail(this.dataSource.manager, dto.subjectIds);
    }

    const saved = await this.teacherRepository.save(teacher);
    return toTeacherDetail(saved);
  }

  async deactivate(caller: Caller, id: string): Promise<void> {
    const teacher = await this.findScoped(caller, id);
    assertAccess(caller, Resource.TEACHER, Action.WRITE, teacherFacts(teacher));

    await this.teacherRepository.update(teacher.id, { isActive: false });
    await this.systemLoggingService.logDeactivated('Teacher', teacher.id, caller);
  }

  /** Classes of the teacher that the caller can also see. */
  async classesOf(caller: Caller, id: string): Promise<ClassDetail[]> {
    const teacher = await this.findScoped(caller, id);

    const qb = this.classRepository
      .createQueryBuilder('cls')
      .leftJoinAndSelect('cls.teacher', 'teacher')
      .leftJoinAndSelect('teacher.user', 'teacherUser')
      .leftJoinAndSelect('cls.subjects', 'subject')
      .loadRelationCountAndMap('cls.studentCount', 'cls.students', 'student', (sub) =>
        sub.andWhere('student.isActive = :active', { active: true }),
      )
      .where('cls.teacherId = :teacherId', { teacherId: teacher.id });
    if (!applyScope(qb, scopeFor(caller, Resource.CLASS), CLASS_SCOPE_COLUMNS)) return [];

    const classes = await qb.orderBy('cls.gradeLevel', 'ASC').addOrderBy('cls.section', 'ASC').getMany();
    return classes.map(toClassDetail);
  }

  /** Students enrolled in the teacher's classes that the caller can also see. */
  async studentsOf(caller: Caller, id: string): Promise<StudentListItem[]> {
    const teacher = await this.findScoped(caller, id);

    const qb = this.studentRepository
      .createQueryBuilder('student')
      .leftJoinAndSelect('student.user', 'user')
      .innerJoinAndSelect('student.class', 'cls')
      .where('cls.teacherId = :teacherId', { teacherId: teacher.id });
    if (!applyScope(qb, scopeFor(caller, Resource.STUDENT), STUDENT_SCOPE_COLUMNS)) return [];

    const students = await qb.orderBy('student.rollNumber', 'ASC').getMany();
    return students.map(toStudentListItem);
  }
}
