import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  ManyToOne,
  ManyToMany,
  JoinColumn,
  JoinTable,
  Index,
} from 'typeorm';
import { Teacher } from '../../teacher/entities/teacher.entity';
import { Subject } from '../../subject/entities/subject.entity';
import { Student } from '../../student/entities/student.entity';

@Index('UQ_class_grade_section_year', ['gradeLevel', 'section', 'academicYear'], { unique: true })
@Entity('classes')
export class Class {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 50 })
  name!: string;

  @Column({ length: 10 })
  gradeLevel!: string;

  @Column({ length: 5 })
  section!: string;

  @Column({ length: 20 })
  academicYear!: string;

  @ManyToOne(() => Teacher, (teacher) => teacher.classes, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'teacherId' })
  teacher?: Teacher | null;

  @Column({ type: 'uuid', nullable: true })
  teacherId!: string | null;

  @ManyToMany(() => Subject, (subject) => subject.classes)
  @JoinTable({
    name: 'class_subjects',
    joinColumn: { name: 'classId', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'subjectId', referencedColumnName: 'id' },
  })
  subjects!: Subject[];

  @OneToMany(() => Student, (student) => student.class)
  students?: Student[];

  @Column({ type: 'varchar', length: 20, nullable: true })
  roomNumber!: string | null;

  @Column({ type: 'int', default: 30 })
  maxStudents!: number;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  // Filled by loadRelationCountAndMap (active students only)
  studentCount?: number;
}
