import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Not, Repository, SelectQueryBuilder } from 'typeorm';
import { Grade } from './entity/grade.entity';
import { Student } from '../student/entities/student.entity';
import { Assignment } from '../assignment/entities/assignment.entity';
import { Teacher } from '../teacher/entities/teacher.entity';
import { CreateGradeDto, GradeQueryDto, UpdateGradeDto } from './dtos/grade.dto';
import { GradeDetail, toGradeDetail } from './grade.mapper';
import { gradeLetter } from './grade-letter';
import { Caller, teacherIdOf } from '../common/access/caller';
import { AccessFacts, Action, Resource, scopeFor } from '../common/access/access-policy';
import { assertAccess } from '../common/access/assert-access';
import { applyScope } from '../common/access/scope-query';
import { GRADE_SCOPE_COLUMNS } from '../common/access/scope-columns';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';
import { findReferenceOrFail } from '../common/utils/references';
import { loaded } from '../common/utils/relations';

function gradeFacts(grade: Pick<Grade, 'studentId' | 'gradedById'>, student: Pick<Student, 'classId'>): AccessFacts {
  return { studentId: grade.studentId, classId: student.classId, teacherId: grade.gradedById };
}

function assertEnrolled(student: Pick<Student, 'classId'>, assignment: Pick<Assignment, 'classId'>): void {
  if (student.classId !== assignment.classId) {
    throw new FieldValidationException('studentId', "Student is not enrolled in the assignment's class");
  }
}

function assertWithinTotal(marksObtained: number, assignment: Pick<Assignment, 'totalMarks'>): void {
  if (marksObtained > assignment.totalMarks) {
    throw new FieldValidationException(
      'marksObtained',
      `Marks obtained cannot exceed total marks (${assignment.totalMarks})`,
    );
  }
}

@Injectable()
export class GradeService {
  private readonly logger = new Logger(GradeService.name);

  constructor(
    @InjectRepository(Grade)
    private readonly gradeRepository: Repository<Grade>,
    private readonly dataSource: DataSource,
  ) {}

  private scoped(caller: Caller): SelectQueryBuilder<Grade> | null {
    const qb = this.gradeRepository
      .createQueryBuilder('grade')
      .innerJoinAndSelect('grade.student', 'student')
      .leftJoinAndSelect('student.user', 'studentUser')
      .leftJoinAndSelect('student.class', 'cls')
      .innerJoinAndSelect('grade.assignment', 'assignment')
      .leftJoinAndSelect('grade.gradedBy', 'gradedBy')
      .leftJoinAndSelect('gradedBy.user', 'gradedByUser');
    return applyScope(qb, scopeFor(caller, Resource.GRADE), GRADE_SCOPE_COLUMNS) ? qb : null;
  }

  async findAll(caller: Caller, query: GradeQueryDto = {}): Promise<GradeDetail[]> {
    const qb = this.scoped(caller);
    if (!qb) return [];

    if (query.studentId) {
      qb.andWhere('grade.studentId = :studentId', { studentId: query.studentId });
    }
    if (query.assignmentId) {
      qb.andWhere('grade.assignmentId = :assignmentId', { assignmentId: query.assignmentId });
    }

    const grades = await qb.orderBy('grade.gradedDate', 'DESC').getMany();
    return grades.map(toGradeDetail);
  }

  private async findScoped(caller: Caller, id: string): Promise<Grade> {
    const qb = this.scoped(caller);
    const grade = qb ? await qb.andWhere('grade.id = :id', { id }).getOne() : null;
    if (!grade) {
      throw new NotFoundException(`Grade with ID ${id} not found`);
    }
    return grade;
  }

  async findOne(caller: Caller, id: string): Promise<GradeDetail> {
    return toGradeDetail(await this.findScoped(caller, id));
  }

  private async assertNotGraded(studentId: string, assignmentId: string, exceptId?: string): Promise<void> {
    const existing = await this.gradeRepository.findOne({
      where: { studentId, assignmentId, ...(exceptId ? { id: Not(exceptId) } : {}) },
    });
    if (existing) {
      throw new FieldValidationException(
        ['studentId', 'assignmentId'],
        'This student already has a grade for this assignment',
      );
    }
  }

  async create(caller: Caller, dto: CreateGradeDto): Promise<GradeDetail> {
    const manager = this.dataSource.manager;
    const student = await findReferenceOrFail(manager, Student, dto.studentId, 'studentId', 'Student', [
      'user',
      'class',
    ]);

    // Authorship is not established yet, so only the student's class counts
    assertAccess(caller, Resource.GRADE, Action.WRITE, { studentId: student.id, classId: student.classId });

    const gradedById = teacherIdOf(caller) ?? dto.gradedById;
    if (!gradedById) {
      throw new FieldValidationException('gradedById', 'gradedById is required');
    }

    const assignment = await findReferenceOrFail(manager, Assignment, dto.assignmentId, 'assignmentId', 'Assignment');
    assertEnrolled(student, assignment);
    const gradedBy = await findReferenceOrFail(manager, Teacher, gradedById, 'gradedById', 'Teacher', ['user']);
    assertWithinTotal(dto.marksObtained, assignment);
    await this.assertNotGraded(student.id, assignment.id);

    const grade = this.gradeRepository.create({
      studentId: student.id,
      assignmentId: assignment.id,
      marksObtained: dto.marksObtained,
      gradeLetter: gradeLetter(dto.marksObtained, assignment.totalMarks),
      comments: dto.comments ?? null,
      gradedById: gradedBy.id,
    });
    const saved = await this.gradeRepository.save(grade);
    Object.assign(saved, { student, assignment, gradedBy });

    this.logger.log(`Grade ${saved.gradeLetter} recorded for student ${student.studentId} by ${caller.username}`);
    return toGradeDetail(saved);
  }

  async update(caller: Caller, id: string, dto: UpdateGradeDto): Promise<GradeDetail> {
    const grade = await this.findScoped(caller, id);
    let student = loaded(grade.student, 'grade.student');
    let assignment = loaded(grade.assignment, 'grade.assignment');
    assertAccess(caller, Resource.GRADE, Action.WRITE, gradeFacts(grade, student));

    const manager = this.dataSource.manager;
    const studentId = dto.studentId ?? grade.studentId;
    const assignmentId = dto.assignmentId ?? grade.assignmentId;
    if (studentId !== grade.studentId) {
      student = await findReferenceOrFail(manager, Student, studentId, 'studentId', 'Student', ['user', 'class']);
    }
    if (assignmentId !== grade.assignmentId) {
      assignment = await findReferenceOrFail(manager, Assignment, assignmentId, 'assignmentId', 'Assignment');
    }
    if (studentId !== grade.studentId || assignmentId !== grade.assignmentId) {
      // A re-targeted grade is judged like a new one, authorship aside
      assertAccess(caller, Resource.GRADE, Action.WRITE, { studentId: student.id, classId: student.classId });
      assertEnrolled(student, assignment);
      grade.studentId = student.id;
      grade.assignmentId = assignment.id;
    }
    if (dto.gradedById !== undefined && dto.gradedById !== grade.gradedById) {
      grade.gradedBy = await findReferenceOrFail(manager, Teacher, dto.gradedById, 'gradedById', 'Teacher', ['user']);
      grade.gradedById = dto.gradedById;
    }
    // The grade must stay writable after the change
    assertAccess(caller, Resource.GRADE, Action.WRITE, gradeFacts(grade, student));

    if (dto.studentId !== undefined || dto.assignmentId !== undefined) {
      await this.assertNotGraded(grade.studentId, grade.assignmentId, grade.id);
    }
    if (dto.marksObtained !== undefined) grade.marksObtained = dto.marksObtained;
    if (dto.comments !== undefined) grade.comments = dto.comments;

    assertWithinTotal(grade.marksObtained, assignment);
    grade.gradeLetter = gradeLetter(grade.marksObtained, assignment.totalMarks);
    grade.student = student;
    grade.assignment = assignment;

    const saved = await this.gradeRepository.save(grade);
    return toGradeDetail(saved);
  }

  async remove(caller: Caller, id: string): Promise<void> {
    const grade = await this.findScoped(caller, id);
    assertAccess(caller, Resource.GRADE, Action.WRITE, gradeFacts(grade, loaded(grade.student, 'grade.student')));

    await this.gradeRepository.delete(grade.id);
    this.logger.log(`Grade ${grade.id} deleted by ${caller.username}`);
  }
}
