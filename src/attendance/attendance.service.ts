import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Not, Repository, SelectQueryBuilder } from 'typeorm';
import { Attendance, AttendanceStatus } from './entity/attendance.entity';
import { Student } from '../student/entities/student.entity';
import { Class } from '../classes/entity/class.entity';
import { Subject } from '../subject/entities/subject.entity';
import { Teacher } from '../teacher/entities/teacher.entity';
import { AttendanceQueryDto, CreateAttendanceDto, UpdateAttendanceDto } from './dtos/attendance.dto';
import { AttendanceDetail, toAttendanceDetail } from './attendance.mapper';
import { Caller, teacherIdOf } from '../common/access/caller';
import { AccessFacts, Action, Resource, scopeFor } from '../common/access/access-policy';
import { assertAccess } from '../common/access/assert-access';
import { applyScope } from '../common/access/scope-query';
import { ATTENDANCE_SCOPE_COLUMNS } from '../common/access/scope-columns';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';
import { findReferenceOrFail } from '../common/utils/references';
import { loaded } from '../common/utils/relations';

const UNIQUE_FIELDS = ['studentId', 'classId', 'subjectId', 'date'] as const;

function attendanceFacts(attendance: Pick<Attendance, 'studentId' | 'classId' | 'markedById'>): AccessFacts {
  return { studentId: attendance.studentId, classId: attendance.classId, teacherId: attendance.markedById };
}

function assertEnrolled(student: Pick<Student, 'classId'>, classId: string): void {
  if (student.classId !== classId) {
    throw new FieldValidationException('studentId', 'Student is not enrolled in this class');
  }
}

@Injectable()
export class AttendanceService {
  private readonly logger = new Logger(AttendanceService.name);

  constructor(
    @InjectRepository(Attendance)
    private readonly attendanceRepository: Repository<Attendance>,
    private readonly dataSource: DataSource,
  ) {}

  private scoped(caller: Caller): SelectQueryBuilder<Attendance> | null {
    const qb = this.attendanceRepository
      .createQueryBuilder('attendance')
      .innerJoinAndSelect('attendance.student', 'student')
      .leftJoinAndSelect('student.user', 'studentUser')
      .leftJoinAndSelect('student.class', 'studentClass')
      .innerJoinAndSelect('attendance.class', 'cls')
      .innerJoinAndSelect('attendance.subject', 'subject')
      .leftJoinAndSelect('attendance.markedBy', 'markedBy')
      .leftJoinAndSelect('markedBy.user', 'markedByUser');
    return applyScope(qb, scopeFor(caller, Resource.ATTENDANCE), ATTENDANCE_SCOPE_COLUMNS) ? qb : null;
  }

  async findAll(caller: Caller, query: AttendanceQueryDto = {}): Promise<AttendanceDetail[]> {
    const qb = this.scoped(caller);
    if (!qb) return [];

    if (query.studentId) qb.andWhere('attendance.studentId = :studentId', { studentId: query.studentId });
    if (query.classId) qb.andWhere('attendance.classId = :classId', { classId: query.classId });
    if (query.subjectId) qb.andWhere('attendance.subjectId = :subjectId', { subjectId: query.subjectId });
    if (query.date) qb.andWhere('attendance.date = :date', { date: query.date });
    if (query.status) qb.andWhere('attendance.status = :status', { status: query.status });

    const records = await qb.orderBy('attendance.date', 'DESC').getMany();
    return records.map(toAttendanceDetail);
  }

  private async findScoped(caller: Caller, id: string): Promise<Attendance> {
    const qb = this.scoped(caller);
    const attendance = qb ? await qb.andWhere('attendance.id = :id', { id }).getOne() : null;
    if (!attendance) {
      throw new NotFoundException(`Attendance record with ID ${id} not found`);
    }
    return attendance;
  }

  async findOne(caller: Caller, id: string): Promise<AttendanceDetail> {
    return toAttendanceDetail(await this.findScoped(caller, id));
  }

  private async assertNotMarked(
    key: Pick<Attendance, 'studentId' | 'classId' | 'subjectId' | 'date'>,
    exceptId?: string,
  ): Promise<void> {
    const existing = await this.attendanceRepository.findOne({
      where: {
        studentId: key.studentId,
        classId: key.classId,
        subjectId: key.subjectId,
        date: key.date,
        ...(exceptId ? { id: Not(exceptId) } : {}),
      },
    });
    if (existing) {
      throw new FieldValidationException(
        UNIQUE_FIELDS,
        'Attendance for this student, class, subject and date is already recorded',
      );
    }
  }

  async create(caller: Caller, dto: CreateAttendanceDto): Promise<AttendanceDetail> {
    // Authorship is not established yet, so only the class counts
    assertAccess(caller, Resource.ATTENDANCE, Action.WRITE, { classId: dto.classId, studentId: dto.studentId });

    const markedById = teacherIdOf(caller) ?? dto.markedById;
    if (!markedById) {
      throw new FieldValidationException('markedById', 'markedById is required');
    }

    const manager = this.dataSource.manager;
    const student = await findReferenceOrFail(manager, Student, dto.studentId, 'studentId', 'Student', [
      'user',
      'class',
    ]);
    const klass = await findReferenceOrFail(manager, Class, dto.classId, 'classId', 'Class');
    const subject = await findReferenceOrFail(manager, Subject, dto.subjectId, 'subjectId', 'Subject');
    assertEnrolled(student, klass.id);
    const markedBy = await findReferenceOrFail(manager, Teacher, markedById, 'markedById', 'Teacher', ['user']);
    await this.assertNotMarked(dto);

    const attendance = this.attendanceRepository.create({
      studentId: student.id,
      classId: klass.id,
      subjectId: subject.id,
      date: dto.date,
      status: dto.status ?? AttendanceStatus.PRESENT,
      markedById: markedBy.id,
      notes: dto.notes ?? null,
    });
    const saved = await this.attendanceRepository.save(attendance);
    Object.assign(saved, { student, class: klass, subject, markedBy });

    this.logger.log(`Attendance ${saved.status} marked for ${student.studentId} on ${saved.date} by ${caller.username}`);
    return toAttendanceDetail(saved);
  }

  async update(caller: Caller, id: string, dto: UpdateAttendanceDto): Promise<AttendanceDetail> {
    const attendance = await this.findScoped(caller, id);
    assertAccess(caller, Resource.ATTENDANCE, Action.WRITE, attendanceFacts(attendance));

    const studentId = dto.studentId ?? attendance.studentId;
    const classId = dto.classId ?? attendance.classId;
    const retargeted = studentId !== attendance.studentId || classId !== attendance.classId;
    if (retargeted) {
      // A re-targeted record is judged like a new one, authorship aside
      assertAccess(caller, Resource.ATTENDANCE, Action.WRITE, { classId, studentId });
    }

    const manager = this.dataSource.manager;
    if (studentId !== attendance.studentId) {
      attendance.student = await findReferenceOrFail(manager, Student, studentId, 'studentId', 'Student', [
        'user',
        'class',
      ]);
      attendance.studentId = studentId;
    }
    if (classId !== attendance.classId) {
      attendance.class = await findReferenceOrFail(manager, Class, classId, 'classId', 'Class');
      attendance.classId = classId;
    }
    if (retargeted) {
      assertEnrolled(loaded(attendance.student, 'attendance.student'), attendance.classId);
    }
    if (dto.subjectId !== undefined && dto.subjectId !== attendance.subjectId) {
      attendance.subject = await findReferenceOrFail(manager, Subject, dto.subjectId, 'subjectId', 'Subject');
      attendance.subjectId = dto.subjectId;
    }
    if (dto.markedById !== undefined && dto.markedById !== attendance.markedById) {
      attendance.markedBy = await findReferenceOrFail(manager, Teacher, dto.markedById, 'markedById', 'Teacher', [
        'user',
      ]);
      attendance.markedById = dto.markedById;
    }
    if (dto.date !== undefined) attendance.date = dto.date;
    // The record must stay writable after the change
    assertAccess(caller, Resource.ATTENDANCE, Action.WRITE, attendanceFacts(attendance));

    if (UNIQUE_FIELDS.some((field) => dto[field] !== undefined)) {
      await this.assertNotMarked(attendance, attendance.id);
    }
    if (dto.status !== undefined) attendance.status = dto.status;
    if (dto.notes !== undefined) attendance.notes = dto.notes;

    const saved = await this.attendanceRepository.save(attendance);
    return toAttendanceDetail(saved);
  }

  async remove(caller: Caller, id: string): Promise<void> {
    const attendance = await this.findScoped(caller, id);
    assertAccess(caller, Resource.ATTENDANCE, Action.WRITE, attendanceFacts(attendance));

    await this.attendanceRepository.delete(attendance.id);
    this.logger.log(`Attendance ${attendance.id} deleted by ${caller.username}`);
  }
}
