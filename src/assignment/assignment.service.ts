import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository, SelectQueryBuilder } from 'typeorm';
import { Assignment, AssignmentType } from './entities/assignment.entity';
import { Subject } from '../subject/entities/subject.entity';
import { Class } from '../classes/entity/class.entity';
import { Teacher } from '../teacher/entities/teacher.entity';
import { Grade } from '../grades/entity/grade.entity';
import { AssignmentQueryDto, CreateAssignmentDto, UpdateAssignmentDto } from './dto/assignment.dto';
import { AssignmentDetail, toAssignmentDetail } from './assignment.mapper';
import { Caller, teacherIdOf } from '../common/access/caller';
import { AccessFacts, Action, Resource, scopeFor } from '../common/access/access-policy';
import { assertAccess } from '../common/access/assert-access';
import { applyScope } from '../common/access/scope-query';
import { ASSIGNMENT_SCOPE_COLUMNS } from '../common/access/scope-columns';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';
import { findReferenceOrFail } from '../common/utils/references';
import { gradeLetter } from '../grades/grade-letter';
import { SystemLoggingService } from '../logs/system-logging.service';

function assignmentFacts(assignment: Pick<Assignment, 'classId' | 'teacherId'>): AccessFacts {
  return { classId: assignment.classId, teacherId: assignment.teacherId };
}

@Injectable()
export class AssignmentsService {
  private readonly logger = new Logger(AssignmentsService.name);

  constructor(
    @InjectRepository(Assignment)
    private readonly assignmentRepository: Repository<Assignment>,
    private readonly dataSource: DataSource,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  private scoped(caller: Caller): SelectQueryBuilder<Assignment> | null {
    const qb = this.assignmentRepository
      .createQueryBuilder('assignment')
      .leftJoinAndSelect('assignment.subject', 'subject')
      .leftJoinAndSelect('assignment.class', 'cls')
      .leftJoinAndSelect('assignment.teacher', 'teacher')
      .leftJoinAndSelect('teacher.user', 'teacherUser');
    return applyScope(qb, scopeFor(caller, Resource.ASSIGNMENT), ASSIGNMENT_SCOPE_COLUMNS) ? qb : null;
  }

  async findAll(caller: Caller, query: AssignmentQueryDto = {}): Promise<AssignmentDetail[]> {
    const qb = this.scoped(caller);
    if (!qb) return [];

    if (!query.includeInactive) {
      qb.andWhere('assignment.isActive = :active', { active: true });
    }
    if (query.classId) {
      qb.andWhere('assignment.classId = :classId', { classId: query.classId });
    }
    if (query.subjectId) {
      qb.andWhere('assignment.subjectId = :subjectId', { subjectId: query.subjectId });
    }
    if (query.search) {
      qb.andWhere('assignment.title ILIKE :search', { search: `%${query.search}%` });
    }

    const assignments = await qb.orderBy('assignment.dueDate', 'DESC').getMany();
    return assignments.map(toAssignmentDetail);
  }

  private async findScoped(caller: Caller, id: string): Promise<Assignment> {
    const qb = this.scoped(caller);
    const assignment = qb ? await qb.andWhere('assignment.id = :id', { id }).getOne() : null;
    if (!assignment) {
      throw new NotFoundException(`Assignment with ID ${id} not found`);
    }
    return assignment;
  }

  async findOne(caller: Caller, id: string): Promise<AssignmentDetail> {
    return toAssignmentDetail(await this.findScoped(caller, id));
  }

  async create(caller: Caller, dto: CreateAssignmentDto): Promise<AssignmentDetail> {
    // Authorship is not established yet, so only the class counts
    assertAccess(caller, Resource.ASSIGNMENT, Action.WRITE, { classId: dto.classId });

    const teacherId = teacherIdOf(caller) ?? dto.teacherId;
    if (!teacherId) {
      throw new FieldValidationException('teacherId', 'teacherId is required');
    }

    const manager = this.dataSource.manager;
    const subject = await findReferenceOrFail(manager, Subject, dto.subjectId, 'subjectId', 'Subject');
    const klass = await findReferenceOrFail(manager, Class, dto.classId, 'classId', 'Class');
    const teacher = await findReferenceOrFail(manager, Teacher, teacherId, 'teacherId', 'Teacher', ['user']);

    const assignment = this.assignmentRepository.create({
      title: dto.title,
      description: dto.description,
      subjectId: subject.id,
      classId: klass.id,
      teacherId: teacher.id,
      assignmentType: dto.assignmentType ?? AssignmentType.HOMEWORK,
      totalMarks: dto.totalMarks ?? 100,
      dueDate: new Date(dto.dueDate),
      instructions: dto.instructions ?? null,
      isActive: dto.isActive ?? true,
    });
    const saved = await this.assignmentRepository.save(assignment);
    Object.assign(saved, { subject, class: klass, teacher });

    this.logger.log(`Assignment "${saved.title}" created by ${caller.username}`);
    return toAssignmentDetail(saved);
  }

  async update(caller: Caller, id: string, dto: UpdateAssignmentDto): Promise<AssignmentDetail> {
    const assignment = await this.findScoped(caller, id);
    assertAccess(caller, Resource.ASSIGNMENT, Action.WRITE, assignmentFacts(assignment));

    const manager = this.dataSource.manager;
    if (dto.subjectId !== undefined && dto.subjectId !== assignment.subjectId) {
      assignment.subject = await findReferenceOrFail(manager, Subject, dto.subjectId, 'subjectId', 'Subject');
      assignment.subjectId = dto.subjectId;
    }
    if (dto.classId !== undefined && dto.classId !== assignment.classId) {
      // Moving to another class is judged like creating there, authorship aside
      assertAccess(caller, Resource.ASSIGNMENT, Action.WRITE, { classId: dto.classId });
      assignment.class = await findReferenceOrFail(manager, Class, dto.classId, 'classId', 'Class');
      assignment.classId = dto.classId;
    }
    if (dto.teacherId !== undefined && dto.teacherId !== assignment.teacherId) {
      assignment.teacher = await findReferenceOrFail(manager, Teacher, dto.teacherId, 'teacherId', 'Teacher', [
        'user',
      ]);
      assignment.teacherId = dto.teacherId;
    }
    // The assignment must stay writable after the change
    assertAccess(caller, Resource.ASSIGNMENT, Action.WRITE, assignmentFacts(assignment));

    if (dto.title !== undefined) assignment.title = dto.title;
    if (dto.description !== undefined) assignment.description = dto.description;
    if (dto.assignmentType !== undefined) assignment.assignmentType = dto.assignmentType;
    if (dto.dueDate !== undefined) assignment.dueDate = new Date(dto.dueDate);
    if (dto.instructions !== undefined) assignment.instructions = dto.instructions;
    if (dto.isActive !== undefined) assignment.isActive = dto.isActive;

    const newTotal = dto.totalMarks;
    if (newTotal === undefined || newTotal === assignment.totalMarks) {
      return toAssignmentDetail(await this.assignmentRepository.save(assignment));
    }

    const saved = await this.dataSource.transaction(async (tx) => {
      const grades = await tx.find(Grade, { where: { assignmentId: assignment.id } });
      const over = grades.filter((grade) => grade.marksObtained > newTotal);
      if (over.length > 0) {
        throw new FieldValidationException(
          'totalMarks',
          `${over.length} existing grade(s) exceed the new total of ${newTotal}`,
        );
      }

      assignment.totalMarks = newTotal;
      const result = await tx.save(assignment);
      for (const grade of grades) {
        grade.gradeLetter = gradeLetter(grade.marksObtained, newTotal);
      }
      await tx.save(grades);
      return result;
    });

    this.logger.log(`Assignment ${assignment.id} total changed to ${newTotal}, regraded its grades`);
    return toAssignmentDetail(saved);
  }

  async deactivate(caller: Caller, id: string): Promise<void> {
    const assignment = await this.findScoped(caller, id);
    assertAccess(caller, Resource.ASSIGNMENT, Action.WRITE, assignmentFacts(assignment));

    await this.assignmentRepository.update(assignment.id, { isActive: false });
    await this.systemLoggingService.logDeactivated('Assignment', assignment.id, caller);
  }
}
