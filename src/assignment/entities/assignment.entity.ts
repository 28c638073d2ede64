import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Subject } from '../../subject/entities/subject.entity';
import { Class } from '../../classes/entity/class.entity';
import { Teacher } from '../../teacher/entities/teacher.entity';
import { Grade } from '../../grades/entity/grade.entity';

export enum AssignmentType {
  HOMEWORK = 'homework',
  PROJECT = 'project',
  QUIZ = 'quiz',
  TEST = 'test',
  EXAM = 'exam',
}

export const ASSIGNMENT_TYPE_DISPLAY: Record<AssignmentType, string> = {
  [AssignmentType.HOMEWORK]: 'Homework',
  [AssignmentType.PROJECT]: 'Project',
  [AssignmentType.QUIZ]: 'Quiz',
  [AssignmentType.TEST]: 'Test',
  [AssignmentType.EXAM]: 'Exam',
};

@Entity('assignments')
export class Assignment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 200 })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @ManyToOne(() => Subject, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'subjectId' })
  subject?: Subject;

  @Column({ type: 'uuid' })
  subjectId!: string;

  @ManyToOne(() => Class, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'classId' })
  class?: Class;

  @Column({ type: 'uuid' })
  classId!: string;

  @ManyToOne(() => Teacher, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'teacherId' })
  teacher?: Teacher;

  @Column({ type: 'uuid' })
  teacherId!: string;

  @Column({ type: 'enum', enum: AssignmentType, default: AssignmentType.HOMEWORK })
  assignmentType!: AssignmentType;

  @Column({ type: 'int', default: 100 })
  totalMarks!: number;

  @Column({ type: 'timestamp' })
  dueDate!: Date;

  @Column({ type: 'text', nullable: true })
  instructions!: string | null;

  @Column({ default: true })
  isActive!: boolean;

  @OneToMany(() => Grade, (grade) => grade.assignment)
  grades?: Grade[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
