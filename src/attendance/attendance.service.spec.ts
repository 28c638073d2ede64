import { ForbiddenException } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';
import { AttendanceService } from './attendance.service';
import { Attendance, AttendanceStatus } from './entity/attendance.entity';
import { adminCaller, staffCaller, teacherCaller } from '../../test/support/callers';
import { queryBuilderMock } from '../../test/support/query-builder.mock';

const student = {
  id: 's1',
  classId: 'c1',
  studentId: 'STU001',
  rollNumber: '7',
  user: { username: 'ada', firstName: 'Ada', lastName: 'Lovelace', email: null },
  class: null,
};
const klass = { id: 'c1', name: 'Grade 5 A', gradeLevel: '5', section: 'A', academicYear: '2026' };
const subject = { id: 'sub-1', name: 'Mathematics', code: 'MATH', credits: 4 };
const teacher = {
  id: 't1',
  employeeId: 'EMP001',
  department: 'Mathematics',
  specialization: null,
  user: { username: 'tom', firstName: 'Tom', lastName: 'Tutor', email: null },
};

const dto = { studentId: 's1', classId: 'c1', subjectId: 'sub-1', date: '2026-03-02' };

describe('AttendanceService', () => {
  let service: AttendanceService;
  const refQb = queryBuilderMock();
  const listQb = queryBuilderMock();
  const attendanceRepo = {
    createQueryBuilder: jest.fn(() => listQb),
    findOne: jest.fn(),
    create: jest.fn((fields: Partial<Attendance>) => ({ ...fields })),
    save: jest.fn(async (value: Partial<Attendance>) => ({ id: 'at1', ...value })),
  };
  const dataSource = { manager: { createQueryBuilder: jest.fn(() => refQb) } };

  beforeEach(() => {
    jest.clearAllMocks();
    refQb.getOne.mockReset();
    listQb.getOne.mockReset();
    attendanceRepo.findOne.mockResolvedValue(null);
    service = new AttendanceService(
      attendanceRepo as unknown as Repository<Attendance>,
      dataSource as unknown as DataSource,
    );
  });

  describe('create', () => {
    function queueReferences() {
      refQb.getOne
        .mockResolvedValueOnce(student)
        .mockResolvedValueOnce(klass)
        .mockResolvedValueOnce(subject)
        .mockResolvedValueOnce(teacher);
    }

    it('defaults to present and records the teacher as marker', async () => {
      queueReferences();

      const result = await service.create(teacherCaller('t1', ['c1']), dto);

      expect(result.status).toBe(AttendanceStatus.PRESENT);
      expect(result.statusDisplay).toBe('Present');
      expect(result.markedBy.name).toBe('Tom Tutor');
      expect(result.student.className).toBeNull();
    });

    it('forbids marking a class the teacher does not teach', async () => {
      await expect(service.create(teacherCaller('t1', ['c2']), dto)).rejects.toBeInstanceOf(ForbiddenException);
    });

    it('is read-only for staff', async () => {
      await expect(service.create(staffCaller, { ...dto, markedById: 't1' })).rejects.toBeInstanceOf(
        ForbiddenException,
      );
    });

    it('rejects a student enrolled in another class', async () => {
      refQb.getOne.mockResolvedValueOnce({ ...student, classId: 'c2' }).mockResolvedValueOnce(klass);

      await expect(service.create(adminCaller, { ...dto, markedById: 't1' })).rejects.toMatchObject({
        response: { errors: { studentId: ['Student is not enrolled in this class'] } },
      });
      expect(attendanceRepo.save).not.toHaveBeenCalled();
    });

    it('rejects a second record for the same student, class, subject and date', async () => {
      queueReferences();
      attendanceRepo.findOne.mockResolvedValueOnce({ id: 'at0' });

      const message = 'Attendance for this student, class, subject and date is already recorded';
      await expect(service.create(adminCaller, { ...dto, markedById: 't1' })).rejects.toMatchObject({
        response: {
          errors: { studentId: [message], classId: [message], subjectId: [message], date: [message] },
        },
      });
      expect(attendanceRepo.save).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    const stored = () => ({
      id: 'at1',
      ...dto,
      status: AttendanceStatus.PRESENT,
      markedById: 't1',
      notes: null,
      markedAt: new Date('2026-03-02T08:00:00Z'),
      student,
      class: klass,
      subject,
      markedBy: teacher,
    });

    it('lets the marker correct the status', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());

      const result = await service.update(teacherCaller('t1', ['c1']), 'at1', { status: AttendanceStatus.ABSENT });

      expect(result.status).toBe(AttendanceStatus.ABSENT);
      expect(result.statusDisplay).toBe('Absent');
      expect(attendanceRepo.findOne).not.toHaveBeenCalled();
    });

    it('forbids the marker moving its record to a class it does not teach', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());

      await expect(service.update(teacherCaller('t1', ['c1']), 'at1', { classId: 'c7' })).rejects.toBeInstanceOf(
        ForbiddenException,
      );
      expect(refQb.getOne).not.toHaveBeenCalled();
      expect(attendanceRepo.save).not.toHaveBeenCalled();
    });

    it('rejects moving a record onto a student of another class', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());
      refQb.getOne.mockResolvedValueOnce({ ...student, id: 's9', classId: 'c9' });

      await expect(service.update(teacherCaller('t1', ['c1']), 'at1', { studentId: 's9' })).rejects.toMatchObject({
        response: { errors: { studentId: ['Student is not enrolled in this class'] } },
      });
      expect(attendanceRepo.save).not.toHaveBeenCalled();
    });
  });
});
