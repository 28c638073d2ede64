import { ForbiddenException } from '@nestjs/common';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { StudentsService } from './student.service';
import { Student, Gender } from './entities/student.entity';
import { SystemLoggingService } from '../logs/system-logging.service';
import { adminCaller, studentCaller, teacherCaller } from '../../test/support/callers';
import { queryBuilderMock } from '../../test/support/query-builder.mock';

const dto = {
  userId: 'u1',
  studentId: 'STU010',
  rollNumber: '10',
  classId: 'c1',
  gender: Gender.FEMALE,
  guardianName: 'Grace Parent',
  guardianPhone: '555-0100',
  admissionDate: '2026-01-10',
};

describe('StudentsService', () => {
  let service: StudentsService;
  const qb = queryBuilderMock();
  const studentRepo = { createQueryBuilder: jest.fn(() => qb) };
  const manager = {
    findOne: jest.fn(),
    count: jest.fn(),
    create: jest.fn((_entity: unknown, fields: object) => ({ ...fields })),
    save: jest.fn(async (entity: object) => ({ id: 's10', ...entity })),
  };
  const dataSource = {
    manager,
    transaction: jest.fn(async (work: (m: EntityManager) => Promise<unknown>) =>
      work(manager as unknown as EntityManager),
    ),
  };

  beforeEach(() => {
    jest.clearAllMocks();
    manager.findOne.mockReset();
    manager.count.mockReset();
    service = new StudentsService(
      studentRepo as unknown as Repository<Student>,
      dataSource as unknown as DataSource,
      {} as SystemLoggingService,
    );
  });

  describe('findAll', () => {
    it('returns nothing without querying for a teacher with no classes', async () => {
      await expect(service.findAll(teacherCaller('t1', []))).resolves.toEqual([]);
      expect(qb.andWhere).not.toHaveBeenCalled();
      expect(qb.getMany).not.toHaveBeenCalled();
    });

    it("narrows a teacher's list to its classes and hides inactive rows", async () => {
      await service.findAll(teacherCaller('t1', ['c1', 'c2']));

      expect(qb.andWhere).toHaveBeenNthCalledWith(1, '(student.classId IN (:...scope_classId_0))', {
        scope_classId_0: ['c1', 'c2'],
      });
      expect(qb.andWhere).toHaveBeenNthCalledWith(2, 'student.isActive = :active', { active: true });
    });

    it('shows a student only itself', async () => {
      await service.findAll(studentCaller('s1', 'c1'), { includeInactive: true });

      expect(qb.andWhere).toHaveBeenCalledTimes(1);
      expect(qb.andWhere).toHaveBeenCalledWith('(student.id IN (:...scope_studentId_0))', {
        scope_studentId_0: ['s1'],
      });
    });
  });

  describe('create', () => {
    it('forbids a teacher enrolling into a class it does not teach', async () => {
      await expect(service.create(teacherCaller('t1', ['c1']), { ...dto, classId: 'c2' })).rejects.toBeInstanceOf(
        ForbiddenException,
      );
      expect(dataSource.transaction).not.toHaveBeenCalled();
    });

    it('rejects enrolment into a full class', async () => {
      manager.findOne
        .mockResolvedValueOnce({ id: 'u1', username: 'lin' })
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce({ id: 'c1', name: 'Grade 5 A', maxStudents: 2 })
        .mockResolvedValueOnce(null);
      manager.count.mockResolvedValueOnce(2);

      await expect(service.create(adminCaller, dto)).rejects.toMatchObject({
        response: { errors: { classId: ['Class is full (2 students)'] } },
      });
      expect(manager.save).not.toHaveBeenCalled();
    });

    it('rejects a roll number already used in the class', async () => {
      manager.findOne
        .mockResolvedValueOnce({ id: 'u1', username: 'lin' })
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce({ id: 'c1', name: 'Grade 5 A', maxStudents: 30 })
        .mockResolvedValueOnce({ id: 's2' });

      await expect(service.create(adminCaller, dto)).rejects.toMatchObject({
        response: { errors: { rollNumber: ['This roll number is already taken in the class'] } },
      });
    });
  });
});
