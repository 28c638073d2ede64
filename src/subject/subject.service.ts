import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ILike, Not, Repository } from 'typeorm';
import { Subject } from './entities/subject.entity';
import { CreateSubjectDto } from './dto/create-subject.dto';
import { UpdateSubjectDto } from './dto/update-subject.dto';
import { ListQueryDto } from '../common/dto/list-query.dto';
import { SubjectDetail, toSubjectDetail } from './subject.mapper';
import { Caller } from '../common/access/caller';
import { Action, Resource, scopeFor } from '../common/access/access-policy';
import { assertAccess } from '../common/access/assert-access';
import { FieldValidationException } from '../common/exceptions/field-validation.exception';

@Injectable()
export class SubjectsService {
  private readonly logger = new Logger(SubjectsService.name);

  constructor(
    @InjectRepository(Subject)
    private readonly subjectRepository: Repository<Subject>,
  ) {}

  // Subject scopes are all-or-nothing, so no SQL translation is needed
  private canRead(caller: Caller): boolean {
    return scopeFor(caller, Resource.SUBJECT).kind === 'all';
  }

  async findAll(caller: Caller, query: ListQueryDto = {}): Promise<SubjectDetail[]> {
    if (!this.canRead(caller)) return [];
    const subjects = await this.subjectRepository.find({
      where: query.search
        ? [{ name: ILike(`%${query.search}%`) }, { code: ILike(`%${query.search}%`) }]
        : {},
      order: { name: 'ASC' },
    });
    return subjects.map(toSubjectDetail);
  }

  private async findVisible(caller: Caller, id: string): Promise<Subject> {
    const subject = this.canRead(caller) ? await this.subjectRepository.findOne({ where: { id } }) : null;
    if (!subject) {
      throw new NotFoundException(`Subject with ID ${id} not found`);
    }
    return subject;
  }

  async findOne(caller: Caller, id: string): Promise<SubjectDetail> {
    return toSubjectDetail(await this.findVisible(caller, id));
  }

  private async assertUnique(name: string | undefined, code: string | undefined, exceptId?: string): Promise<void> {
    const idFilter = exceptId ? { id: Not(exceptId) } : {};
    if (name !== undefined && (await this.subjectRepository.findOne({ where: { name, ...idFilter } }))) {
      throw new FieldValidationException('name', 'A subject with this name already exists');
    }
    if (code !== undefined && (await this.subjectRepository.findOne({ where: { code, ...idFilter } }))) {
      throw new FieldValidationException('code', 'A subject with this code already exists');
    }
  }

  async create(caller: Caller, dto: CreateSubjectDto): Promise<SubjectDetail> {
    assertAccess(caller, Resource.SUBJECT, Action.WRITE);
    await this.assertUnique(dto.name, dto.code);

    const subject = this.subjectRepository.create({
      name: dto.name,
      code: dto.code,
      description: dto.description ?? null,
      credits: dto.credits ?? 1,
    });
    const saved = await this.subjectRepository.save(subject);
    this.logger.log(`Subject ${saved.code} created by ${caller.username}`);
    return toSubjectDetail(saved);
  }

  async update(caller: Caller, id: string, dto: UpdateSubjectDto): Promise<SubjectDetail> {
    const subject = await this.findVisible(caller, id);
    assertAccess(caller, Resource.SUBJECT, Action.WRITE);
    await this.assertUnique(dto.name, dto.code, id);

    this.subjectRepository.merge(subject, dto);
    return toSubjectDetail(await this.subjectRepository.save(subject));
  }

  async remove(caller: Caller, id: string): Promise<void> {
    const subject = await this.findVisible(caller, id);
    assertAccess(caller, Resource.SUBJECT, Action.WRITE);
    await this.subjectRepository.remove(subject);
    this.logger.log(`Subject ${subject.code} deleted by ${caller.username}`);
  }
}
