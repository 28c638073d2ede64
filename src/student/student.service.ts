import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Not, Repository, SelectQueryBuilder } from 'typeorm';
import { Student } from './entities/student.entity';
import { User } from '../user/entities/user.entity';
import { Class } from '../classes/entity/class.entity';
import { CreateStudentDto, StudentProfileFieldsDto } from './dto/create-student.dto';
import { UpdateStudentDto } from './dto/update-student.dto';
import { ClassFilterQueryDto } from '../common/dto/list-query.dto';
import { StudentDetail, StudentListItem, toStudentDetail, toStudentListItem } from './student.mapper';
import { Caller } from '../common/access/caller';
import { AccessFacts, Action, Resource, scopeFor } from '../common/access/access-policy';
import { assertAccess } from '../common/access/assert-access';
import { applyScope } from '../common/access/scope-query';
import { STUDENT_SCOPE_COLUMNS } from '../common/access/scope-columns';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';
import { SystemLoggingService } from '../logs/system-logging.service';

function studentFacts(student: Pick<Student, 'id' | 'userId' | 'classId'>): AccessFacts {
  return { studentId: student.id, userId: student.userId, classId: student.classId };
}

@Injectable()
export class StudentsService {
  private readonly logger = new Logger(StudentsService.name);

  constructor(
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    private readonly dataSource: DataSource,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  private scoped(caller: Caller): SelectQueryBuilder<Student> | null {
    const qb = this.studentRepository
      .createQueryBuilder('student')
      .leftJoinAndSelect('student.user', 'user')
      .leftJoinAndSelect('student.class', 'cls');
    return applyScope(qb, scopeFor(caller, Resource.STUDENT), STUDENT_SCOPE_COLUMNS) ? qb : null;
  }

  async findAll(caller: Caller, query: ClassFilterQueryDto = {}): Promise<StudentListItem[]> {
    const qb = this.scoped(caller);
    if (!qb) return [];

    if (!query.includeInactive) {
      qb.andWhere('student.isActive = :active', { active: true });
    }
    if (query.classId) {
      qb.andWhere('student.classId = :classId', { classId: query.classId });
    }
    if (query.search) {
      qb.andWhere(
        '(user.firstName ILIKE :search OR user.lastName ILIKE :search OR student.studentId ILIKE :search)',
        { search: `%${query.search}%` },
      );
    }

    const students = await qb.orderBy('student.rollNumber', 'ASC').getMany();
    return students.map(toStudentListItem);
  }

  private async findScoped(caller: Caller, id: string): Promise<Student> {
    const qb = this.scoped(caller);
    const student = qb ? await qb.andWhere('student.id = :id', { id }).getOne() : null;
    if (!student) {
      throw new NotFoundException(`Student with ID ${id} not found`);
    }
    return student;
  }

  async findOne(caller: Caller, id: string): Promise<StudentDetail> {
    return toStudentDetail(await this.findScoped(caller, id));
  }

  /** Class lookup plus the capacity and roll-number checks for enrolling into it. */
  private async checkEnrollment(
    manager: EntityManager,
    classId: string | null,
    rollNumber: string,
    exceptStudentId?: string,
  ): Promise<Class | null> {
    if (!classId) return null;

    const klass = await manager.findOne(Class, { where: { id: classId } });
    if (!klass) {
      throw new FieldValidationException('classId', 'Class not found');
    }

    const idFilter = exceptStudentId ? { id: Not(exceptStudentId) } : {};
    const rollTaken = await manager.findOne(Student, { where: { classId, rollNumber, ...idFilter } });
    if (rollTaken) {
      throw new FieldValidationException('rollNumber', 'This roll number is already taken in the class');
    }

    const enrolled = await manager.count(Student, { where: { classId, isActive: true, ...idFilter } });
    if (enrolled >= klass.maxStudents) {
      throw new FieldValidationException('classId', `Class is full (${klass.maxStudents} students)`);
    }
    return klass;
  }

  /**
   * Creates the Student row for an existing account inside the given
   * transaction. Shared by the student endpoint, registration and conversion.
   */
  async createInTransaction(
    manager: EntityManager,
    user: User,
    fields: StudentProfileFieldsDto,
    isActive = true,
  ): Promise<Student> {
    const [existing, duplicate] = await Promise.all([
      manager.findOne(Student, { where: { userId: user.id } }),
      manager.findOne(Student, { where: { studentId: fields.studentId } }),
    ]);
    if (existing) {
      throw new FieldValidationException('userId', 'This user already has a student profile');
    }
    if (duplicate) {
      throw new FieldValidationException('studentId', 'A student with this student id already exists');
    }

    const klass = await this.checkEnrollment(manager, fields.classId ?? null, fields.rollNumber);
    const student = manager.create(Student, {
      userId: user.id,
      studentId: fields.studentId,
      rollNumber: fields.rollNumber,
      classId: klass?.id ?? null,
      gender: fields.gender,
      guardianName: fields.guardianName,
      guardianPhone: fields.guardianPhone,
      guardianEmail: fields.guardianEmail ?? null,
      emergencyContact: fields.emergencyContact ?? null,
      admissionDate: fields.admissionDate,
      bloodGroup: fields.bloodGroup ?? null,
      medicalConditions: fields.medicalConditions ?? null,
      isActive,
    });
    const saved = await manager.save(student);
    saved.user = user;
    saved.class = klass;
    return saved;
  }

  async create(caller: Caller, dto: CreateStudentDto): Promise<StudentDetail> {
    assertAccess(caller, Resource.STUDENT, Action.WRITE, { classId: dto.classId ?? null });

    const student = await this.dataSource.transaction(async (manager) => {
      const user = await manager.findOne(User, { where: { id: dto.userId } });
      if (!user) {
        throw new FieldValidationException('userId', 'User not found');
      }
      return this.createInTransaction(manager, user, dto, dto.isActive ?? true);
    });

    this.logger.log(`Student ${student.studentId} created by ${caller.username}`);
    return toStudentDetail(student);
  }

  async update(caller: Caller, id: string, dto: UpdateStudentDto): Promise<StudentDetail> {
    const student = await this.findScoped(caller, id);
    assertAccess(caller, Resource.STUDENT, Action.WRITE, studentFacts(student));

    const classId = dto.classId !== undefined ? dto.classId : student.classId;
    const rollNumber = dto.rollNumber ?? student.rollNumber;
    // The student must stay writable after the change
    assertAccess(caller, Resource.STUDENT, Action.WRITE, { ...studentFacts(student), classId });

    if (dto.studentId !== undefined && dto.studentId !== student.studentId) {
      const duplicate = await this.studentRepository.findOne({
        where: { studentId: dto.studentId, id: Not(student.id) },
      });
      if (duplicate) {
        throw new FieldValidationException('studentId', 'A student with this student id already exists');
      }
      student.studentId = dto.studentId;
    }

    if (classId !== student.classId || rollNumber !== student.rollNumber) {
      student.class = await this.checkEnrollment(this.dataSource.manager, classId, rollNumber, student.id);
      student.classId = classId;
      student.rollNumber = rollNumber;
    }

    if (dto.gender !== undefined) student.gender = dto.gender;
    if (dto.guardianName !== undefined) student.guardianName = dto.guardianName;
    if (dto.guardianPhone !== undefined) student.guardianPhone = dto.guardianPhone;
    if (dto.guardianEmail !== undefined) student.guardianEmail = dto.guardianEmail;
    if (dto.emergencyContact !== undefined) student.emergencyContact = dto.emergencyContact;
    if (dto.admissionDate !== undefined) student.admissionDate = dto.admissionDate;
    if (dto.bloodGroup !== undefined) student.bloodGroup = dto.bloodGroup;
    if (dto.medicalConditions !== undefined) student.medicalConditions = dto.medicalConditions;
    if (dto.isActive !== undefined) student.isActive = dto.isActive;

    const saved = await this.studentRepository.save(student);
    return toStudentDetail(saved);
  }

  async deactivate(caller: Caller, id: string): Promise<void> {
    const student = await this.findScoped(caller, id);
    assertAccess(caller, Resource.STUDENT, Action.WRITE, studentFacts(student));

    await this.studentRepository.update(student.id, { isActive: false });
    await this.systemLoggingService.logDeactivated('Student', student.id, caller);
  }
}
