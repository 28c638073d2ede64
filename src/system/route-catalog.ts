import { Injectable, RequestMethod } from '@nestjs/common';
import { ModulesContainer, Reflector } from '@nestjs/core';
import { METHOD_METADATA, PATH_METADATA } from '@nestjs/common/constants';
import { IS_PUBLIC_KEY } from '../common/decorators/public.decorator';
import { ROLES_KEY } from '../common/decorators/roles.decorator';
import { Role } from '../user/enums/role.enum';

export const API_PREFIX = 'api/v1';

export interface RouteMeta {
  method: string;
  path: string;
  handler: string;
  public: boolean;
  roles: Role[];
}

export function normalizePath(raw: unknown): string {
  if (typeof raw !== 'string') return '';
  return raw.replace(/^\/+/, '').replace(/\/+$/, '');
}

export function joinPath(...segments: string[]): string {
  const joined = segments.map(normalizePath).filter(Boolean).join('/');
  return `/${joined}`.replace(/\/+/g, '/');
}

function pathsOf(meta: unknown): string[] {
  if (Array.isArray(meta)) return meta.map(normalizePath);
  return [normalizePath(meta)];
}

/**
 * Walks the controllers Nest has registered and reads their route metadata.
 * Routes are grouped by the controller's base path.
 */
@Injectable()
export class RouteCatalog {
  private cache: Record<string, RouteMeta[]> | null = null;

  constructor(
    private readonly modulesContainer: ModulesContainer,
    private readonly reflector: Reflector,
  ) {}

  grouped(): Record<string, RouteMeta[]> {
    if (!this.cache) this.cache = this.collect();
    return this.cache;
  }

  private collect(): Record<string, RouteMeta[]> {
    const groups: Record<string, RouteMeta[]> = {};

    for (const moduleRef of this.modulesContainer.values()) {
      for (const wrapper of moduleRef.controllers.values()) {
        const controllerClass = wrapper.metatype;
        if (typeof controllerClass !== 'function') continue;

        const basePaths = pathsOf(Reflect.getMetadata(PATH_METADATA, controllerClass));
        const group = basePaths[0] || 'root';
        const prototype: object = controllerClass.prototype;

        for (const name of Object.getOwnPropertyNames(prototype)) {
          if (name === 'constructor') continue;
          const handler: unknown = Object.getOwnPropertyDescriptor(prototype, name)?.value;
          if (typeof handler !== 'function') continue;

          const methodMeta: unknown = Reflect.getMetadata(METHOD_METADATA, handler);
          if (typeof methodMeta !== 'number') continue;

          const targets = [handler, controllerClass];
          const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, targets) ?? false;
          const roles = this.reflector.getAllAndOverride<Role[]>(ROLES_KEY, targets) ?? [];

          for (const base of basePaths) {
            for (const route of pathsOf(Reflect.getMetadata(PATH_METADATA, handler))) {
              (groups[group] ??= []).push({
                method: RequestMethod[methodMeta],
                path: joinPath(API_PREFIX, base, route),
                handler: name,
                public: isPublic,
                roles,
              });
            }
          }
        }
      }
    }

    for (const routes of Object.values(groups)) {
      routes.sort((a, b) => a.path.localeCompare(b.path) || a.method.localeCompare(b.method));
    }
    return groups;
  }
}
