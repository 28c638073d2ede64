import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  ManyToOne,
  CreateDateColumn,
  UpdateDateColumn,
  JoinColumn,
  Index,
} from 'typeorm';
import { Student } from '../../student/entities/student.entity';
import { Assignment } from '../../assignment/entities/assignment.entity';
import { Teacher } from '../../teacher/entities/teacher.entity';
import { numericTransformer } from '../../common/utils/numeric.transformer';

@Index('UQ_grade_student_assignment', ['studentId', 'assignmentId'], { unique: true })
@Entity('grades')
export class Grade {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ManyToOne(() => Student, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId' })
  student?: Student;

  @Column({ type: 'uuid' })
  studentId!: string;

  @ManyToOne(() => Assignment, (assignment) => assignment.grades, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'assignmentId' })
  assignment?: Assignment;

  @Column({ type: 'uuid' })
  assignmentId!: string;

  @Column({ type: 'decimal', precision: 5, scale: 2, transformer: numericTransformer })
  marksObtained!: number;

  @Column({ length: 2 })
  gradeLetter!: string;

  @Column({ type: 'text', nullable: true })
  comments!: string | null;

  @CreateDateColumn()
  submittedDate!: Date;

  @UpdateDateColumn()
  gradedDate!: Date;

  // Teacher of record
  @ManyToOne(() => Teacher, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'gradedById' })
  gradedBy?: Teacher;

  @Column({ type: 'uuid' })
  gradedById!: string;
}
