import { BadRequestException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';
import { GradeService } from './grade.service';
import { Grade } from './entity/grade.entity';
import { adminCaller, studentCaller, teacherCaller } from '../../test/support/callers';
import { queryBuilderMock } from '../../test/support/query-builder.mock';

const gradedAt = new Date('2026-03-02T09:00:00Z');

const student = {
  id: 's1',
  classId: 'c1',
  studentId: 'STU001',
  rollNumber: '7',
  user: { username: 'ada', firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.com' },
  class: { name: 'Grade 5 A' },
};

const assignment = {
  id: 'a1',
  classId: 'c1',
  title: 'Fractions quiz',
  assignmentType: 'quiz',
  totalMarks: 50,
  dueDate: new Date('2026-03-01T00:00:00Z'),
};

const teacher = {
  id: 't1',
  employeeId: 'EMP001',
  department: 'Mathematics',
  specialization: null,
  user: { username: 'tom', firstName: 'Tom', lastName: 'Tutor', email: null },
};

describe('GradeService', () => {
  let service: GradeService;
  const refQb = queryBuilderMock();
  const listQb = queryBuilderMock();
  const gradeRepo = {
    createQueryBuilder: jest.fn(() => listQb),
    findOne: jest.fn(),
    create: jest.fn((fields: Partial<Grade>) => ({ ...fields })),
    save: jest.fn(async (grade: Partial<Grade>) => ({ id: 'g1', submittedDate: gradedAt, gradedDate: gradedAt, ...grade })),
    delete: jest.fn(),
  };
  const dataSource = { manager: { createQueryBuilder: jest.fn(() => refQb) } };

  beforeEach(() => {
    jest.clearAllMocks();
    refQb.getOne.mockReset();
    listQb.getOne.mockReset();
    gradeRepo.findOne.mockResolvedValue(null);
    service = new GradeService(
      gradeRepo as unknown as Repository<Grade>,
      dataSource as unknown as DataSource,
    );
  });

  describe('create', () => {
    it('records the grade with its computed letter', async () => {
      refQb.getOne.mockResolvedValueOnce(student).mockResolvedValueOnce(assignment).mockResolvedValueOnce(teacher);

      const result = await service.create(teacherCaller('t1', ['c1']), {
        studentId: 's1',
        assignmentId: 'a1',
        marksObtained: 45,
      });

      expect(gradeRepo.create).toHaveBeenCalledWith({
        studentId: 's1',
        assignmentId: 'a1',
        marksObtained: 45,
        gradeLetter: 'A+',
        comments: null,
        gradedById: 't1',
      });
      expect(result.gradeLetter).toBe('A+');
      expect(result.percentage).toBe(90);
      expect(result.student).toEqual({
        id: 's1',
        name: 'Ada Lovelace',
        email: 'ada@example.com',
        studentId: 'STU001',
        rollNumber: '7',
        className: 'Grade 5 A',
      });
      expect(result.gradedBy.name).toBe('Tom Tutor');
    });

    it('rejects marks above the assignment total on marksObtained', async () => {
      refQb.getOne.mockResolvedValueOnce(student).mockResolvedValueOnce(assignment).mockResolvedValueOnce(teacher);

      const attempt = service.create(adminCaller, {
        studentId: 's1',
        assignmentId: 'a1',
        marksObtained: 55,
        gradedById: 't1',
      });

      await expect(attempt).rejects.toBeInstanceOf(BadRequestException);
      await attempt.catch((err: BadRequestException) => {
        expect(err.getResponse()).toEqual({
          message: 'Marks obtained cannot exceed total marks (50)',
          errors: { marksObtained: ['Marks obtained cannot exceed total marks (50)'] },
        });
      });
      expect(gradeRepo.save).not.toHaveBeenCalled();
    });

    it('forbids a teacher grading a student outside its classes', async () => {
      refQb.getOne.mockResolvedValueOnce({ ...student, classId: 'c2' });

      await expect(
        service.create(teacherCaller('t1', ['c1']), { studentId: 's1', assignmentId: 'a1', marksObtained: 30 }),
      ).rejects.toBeInstanceOf(ForbiddenException);
      expect(refQb.getOne).toHaveBeenCalledTimes(1);
    });

    it("rejects a student outside the assignment's class", async () => {
      refQb.getOne.mockResolvedValueOnce(student).mockResolvedValueOnce({ ...assignment, classId: 'c2' });

      await expect(
        service.create(adminCaller, { studentId: 's1', assignmentId: 'a1', marksObtained: 40, gradedById: 't1' }),
      ).rejects.toMatchObject({
        response: { errors: { studentId: ["Student is not enrolled in the assignment's class"] } },
      });
      expect(gradeRepo.save).not.toHaveBeenCalled();
    });

    it('rejects a second grade for the same student and assignment', async () => {
      refQb.getOne.mockResolvedValueOnce(student).mockResolvedValueOnce(assignment).mockResolvedValueOnce(teacher);
      gradeRepo.findOne.mockResolvedValueOnce({ id: 'g0' });

      const attempt = service.create(adminCaller, {
        studentId: 's1',
        assignmentId: 'a1',
        marksObtained: 40,
        gradedById: 't1',
      });

      await expect(attempt).rejects.toMatchObject({
        response: {
          errors: {
            studentId: ['This student already has a grade for this assignment'],
            assignmentId: ['This student already has a grade for this assignment'],
          },
        },
      });
    });

    it('requires gradedById when an admin records the grade', async () => {
      refQb.getOne.mockResolvedValueOnce(student);

      await expect(
        service.create(adminCaller, { studentId: 's1', assignmentId: 'a1', marksObtained: 40 }),
      ).rejects.toMatchObject({ response: { errors: { gradedById: ['gradedById is required'] } } });
    });

    it('names the field of a missing reference', async () => {
      refQb.getOne.mockResolvedValueOnce(null);

      await expect(
        service.create(adminCaller, { studentId: 's9', assignmentId: 'a1', marksObtained: 40, gradedById: 't1' }),
      ).rejects.toMatchObject({ response: { errors: { studentId: ['Student not found'] } } });
    });
  });

  describe('reads', () => {
    it('returns 404 for a grade outside the caller scope', async () => {
      listQb.getOne.mockResolvedValueOnce(null);

      await expect(service.findOne(studentCaller('s2', 'c1'), 'g1')).rejects.toBeInstanceOf(NotFoundException);
      expect(listQb.andWhere).toHaveBeenCalledWith('(grade.studentId IN (:...scope_studentId_0))', {
        scope_studentId_0: ['s2'],
      });
    });
  });

  describe('update', () => {
    const stored = () => ({
      id: 'g1',
      studentId: 's1',
      assignmentId: 'a1',
      gradedById: 't1',
      marksObtained: 45,
      gradeLetter: 'A+',
      comments: null,
      student,
      assignment,
      gradedBy: teacher,
    });

    it('recomputes the letter when marks change', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());

      const result = await service.update(teacherCaller('t1', ['c1']), 'g1', { marksObtained: 32 });

      expect(result.gradeLetter).toBe('B');
      expect(result.percentage).toBe(64);
      expect(gradeRepo.findOne).not.toHaveBeenCalled();
    });

    it('forbids the grader moving its grade onto a student outside its classes', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());
      refQb.getOne.mockResolvedValueOnce({ ...student, id: 's9', classId: 'c9' });

      await expect(service.update(teacherCaller('t1', ['c1']), 'g1', { studentId: 's9' })).rejects.toBeInstanceOf(
        ForbiddenException,
      );
      expect(gradeRepo.save).not.toHaveBeenCalled();
    });

    it('rejects moving a grade to an assignment of another class', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());
      refQb.getOne.mockResolvedValueOnce({ ...assignment, id: 'a2', classId: 'c2' });

      await expect(service.update(adminCaller, 'g1', { assignmentId: 'a2' })).rejects.toMatchObject({
        response: { errors: { studentId: ["Student is not enrolled in the assignment's class"] } },
      });
      expect(gradeRepo.save).not.toHaveBeenCalled();
    });
  });
});
