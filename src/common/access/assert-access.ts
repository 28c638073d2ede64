import { ForbiddenException } from '@nestjs/common';
import { AccessFacts, Action, Resource, canAccess } from './access-policy';
import { Caller } from './caller';

export function assertAccess(caller: Caller, resource: Resource, action: Action, facts: AccessFacts = {}): void {
  if (!canAccess(caller, resource, action, facts)) {
    throw new ForbiddenException();
  }
}
