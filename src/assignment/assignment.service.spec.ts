import { ForbiddenException } from '@nestjs/common';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { AssignmentsService } from './assignment.service';
import { Assignment, AssignmentType } from './entities/assignment.entity';
import { SystemLoggingService } from '../logs/system-logging.service';
import { adminCaller, studentCaller, teacherCaller } from '../../test/support/callers';
import { queryBuilderMock } from '../../test/support/query-builder.mock';

const subject = { id: 'sub-1', name: 'Mathematics', code: 'MATH', credits: 4 };
const klass = { id: 'c1', name: 'Grade 5 A', gradeLevel: '5', section: 'A', academicYear: '2026' };
const teacher = {
  id: 't1',
  employeeId: 'EMP001',
  department: 'Mathematics',
  specialization: 'Algebra',
  user: { username: 'tom', firstName: 'Tom', lastName: 'Tutor', email: null },
};

const dto = {
  title: 'Fractions worksheet',
  description: 'Exercises 1 to 20',
  subjectId: 'sub-1',
  classId: 'c1',
  dueDate: '2026-04-01T00:00:00.000Z',
};

describe('AssignmentsService', () => {
  let service: AssignmentsService;
  const refQb = queryBuilderMock();
  const listQb = queryBuilderMock();
  const tx = { find: jest.fn(), save: jest.fn(async (value: unknown) => value) };
  const assignmentRepo = {
    createQueryBuilder: jest.fn(() => listQb),
    create: jest.fn((fields: Partial<Assignment>) => ({ ...fields })),
    save: jest.fn(async (value: Partial<Assignment>) => ({ id: 'as1', ...value })),
  };
  const dataSource = {
    manager: { createQueryBuilder: jest.fn(() => refQb) },
    transaction: jest.fn(async (work: (m: EntityManager) => Promise<unknown>) =>
      work(tx as unknown as EntityManager),
    ),
  };

  beforeEach(() => {
    jest.clearAllMocks();
    refQb.getOne.mockReset();
    listQb.getOne.mockReset();
    service = new AssignmentsService(
      assignmentRepo as unknown as Repository<Assignment>,
      dataSource as unknown as DataSource,
      {} as SystemLoggingService,
    );
  });

  describe('create', () => {
    it('records the calling teacher as author', async () => {
      refQb.getOne.mockResolvedValueOnce(subject).mockResolvedValueOnce(klass).mockResolvedValueOnce(teacher);

      const result = await service.create(teacherCaller('t1', ['c1']), dto);

      expect(assignmentRepo.create).toHaveBeenCalledWith(
        expect.objectContaining({
          teacherId: 't1',
          classId: 'c1',
          assignmentType: AssignmentType.HOMEWORK,
          totalMarks: 100,
          isActive: true,
        }),
      );
      expect(result.teacher.name).toBe('Tom Tutor');
      expect(result.assignmentTypeDisplay).toBe('Homework');
    });

    it('forbids a teacher not assigned to the class', async () => {
      await expect(service.create(teacherCaller('t1', ['c1']), { ...dto, classId: 'c2' })).rejects.toBeInstanceOf(
        ForbiddenException,
      );
      expect(refQb.getOne).not.toHaveBeenCalled();
    });

    it('forbids students', async () => {
      await expect(service.create(studentCaller('s1', 'c1'), dto)).rejects.toBeInstanceOf(ForbiddenException);
    });

    it('needs an explicit teacherId from an admin', async () => {
      await expect(service.create(adminCaller, dto)).rejects.toMatchObject({
        response: { errors: { teacherId: ['teacherId is required'] } },
      });
    });
  });

  describe('update', () => {
    const stored = () => ({
      id: 'as1',
      ...dto,
      dueDate: new Date(dto.dueDate),
      teacherId: 't1',
      assignmentType: AssignmentType.QUIZ,
      totalMarks: 50,
      instructions: null,
      isActive: true,
      subject,
      class: klass,
      teacher,
    });

    it('refuses a total below an existing grade', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());
      tx.find.mockResolvedValueOnce([{ marksObtained: 45 }, { marksObtained: 20 }]);

      await expect(service.update(adminCaller, 'as1', { totalMarks: 40 })).rejects.toMatchObject({
        response: { errors: { totalMarks: ['1 existing grade(s) exceed the new total of 40'] } },
      });
      expect(tx.save).not.toHaveBeenCalled();
    });

    it('regrades existing grades against the new total', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());
      const grades = [
        { marksObtained: 45, gradeLetter: 'A+' },
        { marksObtained: 20, gradeLetter: 'C' },
      ];
      tx.find.mockResolvedValueOnce(grades);

      const result = await service.update(teacherCaller('t1', ['c1']), 'as1', { totalMarks: 100 });

      expect(result.totalMarks).toBe(100);
      expect(grades.map((g) => g.gradeLetter)).toEqual(['C', 'F']);
    });

    it('forbids the author moving its assignment to a class it does not teach', async () => {
      listQb.getOne.mockResolvedValueOnce(stored());

      await expect(service.update(teacherCaller('t1', ['c1']), 'as1', { classId: 'c7' })).rejects.toBeInstanceOf(
        ForbiddenException,
      );
      expect(refQb.getOne).not.toHaveBeenCalled();
      expect(assignmentRepo.save).not.toHaveBeenCalled();
    });

    it("forbids moving another teacher's assignment to a class the caller does not teach", async () => {
      listQb.getOne.mockResolvedValueOnce({ ...stored(), teacherId: 't2' });

      await expect(service.update(teacherCaller('t1', ['c1']), 'as1', { classId: 'c7' })).rejects.toBeInstanceOf(
        ForbiddenException,
      );
    });
  });
});
