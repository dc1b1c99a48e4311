/**
 * Builds the route table once at startup from @RouteAuth() metadata
 */

import { Injectable, Logger, OnModuleInit, RequestMethod } from '@nestjs/common';
import { METHOD_METADATA, PATH_METADATA } from '@nestjs/common/constants';
import { DiscoveryService, MetadataScanner, Reflector } from '@nestjs/core';
import { ROUTE_AUTH_KEY, RouteAuthOptions } from './route-auth.decorator';
import { RouteEntry, RouteTable, toRequirement } from './route-table';

function toPaths(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [''];
  }
  return Array.isArray(value) ? value : [value];
}

function joinPath(...parts: string[]): string {
  const joined = parts
    .map((part) => part.replace(/^\/+|\/+$/g, ''))
    .filter((part) => part.length > 0)
    .join('/');
  return `/${joined}`;
}

@Injectable()
export class RouteTableExplorer implements OnModuleInit {
  private readonly logger = new Logger(RouteTableExplorer.name);
  private table: RouteTable = RouteTable.build([]);

  constructor(
    private discoveryService: DiscoveryService,
    private metadataScanner: MetadataScanner,
    private reflector: Reflector,
  ) {}

  onModuleInit() {
    this.table = RouteTable.build(this.explore());
    this.logger.log(`Route table built with ${this.table.size} protected routes`);
  }

  getTable(): RouteTable {
    return this.table;
  }

  explore(): RouteEntry[] {
    const entries: RouteEntry[] = [];

    for (const wrapper of this.discoveryService.getControllers()) {
      const { instance, metatype } = wrapper;
      if (!instance || !metatype) {
        continue;
      }

      const prototype: object = Object.getPrototypeOf(instance);
      const controllerPaths = toPaths(
        this.reflector.get<string | string[] | undefined>(PATH_METADATA, metatype),
      );

      for (const name of this.metadataScanner.getAllMethodNames(prototype)) {
        const handler: unknown = Reflect.get(prototype, name);
        if (typeof handler !== 'function') {
          continue;
        }

        const method = this.reflector.get<RequestMethod | undefined>(
          METHOD_METADATA,
          handler,
        );
        const options = this.reflector.getAllAndOverride<RouteAuthOptions | undefined>(
          ROUTE_AUTH_KEY,
          [handler, metatype],
        );
        if (method === undefined || !options) {
          continue;
        }

        const requirement = toRequirement(options);
        const methodPaths = toPaths(
          this.reflector.get<string | string[] | undefined>(PATH_METADATA, handler),
        );

        for (const controllerPath of controllerPaths) {
          for (const methodPath of methodPaths) {
            entries.push({
              method: RequestMethod[method],
              path: joinPath(controllerPath, methodPath),
              requirement,
            });
          }
        }
      }
    }

    return entries;
  }
}
