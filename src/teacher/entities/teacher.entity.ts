import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  OneToOne,
  OneToMany,
  ManyToMany,
  JoinColumn,
  JoinTable,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import { User } from '../../user/entities/user.entity';
import { Subject } from '../../subject/entities/subject.entity';
import { Class } from '../../classes/entity/class.entity';

@Entity('teachers')
export class Teacher {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @OneToOne(() => User, (user) => user.teacher, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: User;

  @Column({ type: 'uuid', unique: true })
  userId!: string;

  @Column({ length: 20, unique: true })
  employeeId!: string;

  @Column({ length: 100 })
  department!: string;

  @Column({ length: 200 })
  qualification!: string;

  @Column({ type: 'int', default: 0 })
  experienceYears!: number;

  @Column({ type: 'varchar', length: 200, nullable: true })
  specialization!: string | null;

  @ManyToMany(() => Subject, (subject) => subject.teachers)
  @JoinTable({
    name: 'teacher_subjects',
    joinColumn: { name: 'teacherId', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'subjectId', referencedColumnName: 'id' },
  })
  subjects!: Subject[];

  @OneToMany(() => Class, (klass) => klass.teacher)
  classes?: Class[];

  @Column({ type: 'date' })
  hireDate!: string;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
