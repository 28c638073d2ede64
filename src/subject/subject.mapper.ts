import { Subject } from './entities/subject.entity';

export interface SubjectSummary {
  id: string;
  name: string;
  code: string;
  credits: number;
}

export interface SubjectDetail extends SubjectSummary {
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export function toSubjectSummary(subject: Subject): SubjectSummary {
  return { id: subject.id, name: subject.name, code: subject.code, credits: subject.credits };
}

export function toSubjectDetail(subject: Subject): SubjectDetail {
  return {
    ...toSubjectSummary(subject),
    description: subject.description,
    createdAt: subject.createdAt,
    updatedAt: subject.updatedAt,
  };
}
