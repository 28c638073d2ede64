import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Not, Repository, SelectQueryBuilder } from 'typeorm';
import { Class } from './entity/class.entity';
import { Teacher } from '../teacher/entities/teacher.entity';
import { CreateClassDto, UpdateClassDto } from './dtos/class.dto';
import { ListQueryDto } from '../common/dto/list-query.dto';
import { ClassDetail, toClassDetail } from './class.mapper';
import { Caller } from '../common/access/caller';
import { AccessFacts, Action, Resource, scopeFor } from '../common/access/access-policy';
import { assertAccess } from '../common/access/assert-access';
import { applyScope } from '../common/access/scope-query';
import { CLASS_SCOPE_COLUMNS } from '../common/access/scope-columns';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';
import { findSubjectsOrFail } from '../subject/subject-references';
import { SystemLoggingService } from '../logs/system-logging.service';

function classFacts(klass: Pick<Class, 'id' | 'teacherId'>): AccessFacts {
  return { classId: klass.id, teacherId: klass.teacherId };
}

@Injectable()
export class ClassService {
  private readonly logger = new Logger(ClassService.name);

  constructor(
    @InjectRepository(Class)
    private readonly classRepository: Repository<Class>,
    @InjectRepository(Teacher)
    private readonly teacherRepository: Repository<Teacher>,
    private readonly dataSource: DataSource,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  private scoped(caller: Caller): SelectQueryBuilder<Class> | null {
    const qb = this.classRepository
      .createQueryBuilder('cls')
      .leftJoinAndSelect('cls.teacher', 'teacher')
      .leftJoinAndSelect('teacher.user', 'teacherUser')
      .leftJoinAndSelect('cls.subjects', 'subject')
      .loadRelationCountAndMap('cls.studentCount', 'cls.students', 'student', (sub) =>
        sub.andWhere('student.isActive = :studentActive', { studentActive: true }),
      );
    return applyScope(qb, scopeFor(caller, Resource.CLASS), CLASS_SCOPE_COLUMNS) ? qb : null;
  }

  async findAll(caller: Caller, query: ListQueryDto = {}): Promise<ClassDetail[]> {
    const qb = this.scoped(caller);
    if (!qb) return [];

    if (!query.includeInactive) {
      qb.andWhere('cls.isActive = :active', { active: true });
    }
    if (query.search) {
      qb.andWhere('cls.name ILIKE :search', { search: `%${query.search}%` });
    }

    const classes = await qb.orderBy('cls.gradeLevel', 'ASC').addOrderBy('cls.section', 'ASC').getMany();
    return classes.map(toClassDetail);
  }

  private async findScoped(caller: Caller, id: string): Promise<Class> {
    const qb = this.scoped(caller);
    const klass = qb ? await qb.andWhere('cls.id = :id', { id }).getOne() : null;
    if (!klass) {
      throw new NotFoundException(`Class with ID ${id} not found`);
    }
    return klass;
  }

  async findOne(caller: Caller, id: string): Promise<ClassDetail> {
    return toClassDetail(await this.findScoped(caller, id));
  }

  private async resolveTeacher(teacherId: string | null | undefined): Promise<Teacher | null> {
    if (!teacherId) return null;
    const teacher = await this.teacherRepository.findOne({ where: { id: teacherId }, relations: { user: true } });
    if (!teacher) {
      throw new FieldValidationException('teacherId', 'Teacher not found');
    }
    return teacher;
  }

  private async assertUniqueSlot(
    slot: Pick<Class, 'gradeLevel' | 'section' | 'academicYear'>,
    exceptId?: string,
  ): Promise<void> {
    const existing = await this.classRepository.findOne({
      where: { ...slot, ...(exceptId ? { id: Not(exceptId) } : {}) },
    });
    if (existing) {
      throw new FieldValidationException(
        'section',
        'A class with this grade level, section and academic year already exists',
      );
    }
  }

  async create(caller: Caller, dto: CreateClassDto): Promise<ClassDetail> {
    assertAccess(caller, Resource.CLASS, Action.WRITE, { teacherId: dto.teacherId ?? null });

    const teacher = await this.resolveTeacher(dto.teacherId);
    await this.assertUniqueSlot(dto);
    const subjects = await findSubjectsOrFail(this.dataSource.manager, dto.subjectIds);

    const klass = this.classRepository.create({
      name: dto.name,
      gradeLevel: dto.gradeLevel,
      section: dto.section,
      academicYear: dto.academicYear,
      teacherId: teacher?.id ?? null,
      subjects,
      roomNumber: dto.roomNumber ?? null,
      maxStudents: dto.maxStudents ?? 30,
      isActive: dto.isActive ?? true,
    });
    const saved = await this.classRepository.save(klass);
    saved.teacher = teacher;
    saved.studentCount = 0;

    this.logger.log(`Class ${saved.name} created by ${caller.username}`);
    return toClassDetail(saved);
  }

  async update(caller: Caller, id: string, dto: UpdateClassDto): Promise<ClassDetail> {
    const klass = await this.findScoped(caller, id);
    assertAccess(caller, Resource.CLASS, Action.WRITE, classFacts(klass));

    if (dto.teacherId !== undefined) {
      const teacher = await this.resolveTeacher(dto.teacherId);
      klass.teacherId = teacher?.id ?? null;
      klass.teacher = teacher;
    }
    // The class must stay writable after the change
    assertAccess(caller, Resource.CLASS, Action.WRITE, classFacts(klass));

    const slot = {
      gradeLevel: dto.gradeLevel ?? klass.gradeLevel,
      section: dto.section ?? klass.section,
      academicYear: dto.academicYear ?? klass.academicYear,
    };
    if (dto.gradeLevel !== undefined || dto.section !== undefined || dto.academicYear !== undefined) {
      await this.assertUniqueSlot(slot, klass.id);
    }

    if (dto.name !== undefined) klass.name = dto.name;
    klass.gradeLevel = slot.gradeLevel;
    klass.section = slot.section;
    klass.academicYear = slot.academicYear;
    if (dto.roomNumber !== undefined) klass.roomNumber = dto.roomNumber;
    if (dto.maxStudents !== undefined) klass.maxStudents = dto.maxStudents;
    if (dto.isActive !== undefined) klass.isActive = dto.isActive;
    if (dto.subjectIds !== undefined) {
      klass.subjects = await findSubjectsOrFail(this.dataSource.manager, dto.subjectIds);
    }

    const saved = await this.classRepository.save(klass);
    return toClassDetail(saved);
  }

  async deactivate(caller: Caller, id: string): Promise<void> {
    const klass = await this.findScoped(caller, id);
    assertAccess(caller, Resource.CLASS, Action.WRITE, classFacts(klass));

    await this.classRepository.update(klass.id, { isActive: false });
    await this.systemLoggingService.logDeactivated('Class', klass.id, caller);
  }
}
