// src/interceptors/serialize.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  NestInterceptor,
  UseInterceptors,
} from "@nestjs/common";
import { plainToInstance } from "class-transformer";
import type { ClassConstructor, ClassTransformOptions } from "class-transformer";
import { Observable, map } from "rxjs";

const DEFAULT_TRANSFORM_OPTS: ClassTransformOptions = {
  excludeExtraneousValues: true,
  enableImplicitConversion: true,
};

/** Shapes handler output through an @Expose()-annotated DTO, dropping everything else. */
export function Serialize<T>(dto: ClassConstructor<T>, opts: ClassTransformOptions = DEFAULT_TRANSFORM_OPTS) {
  return UseInterceptors(new SerializeInterceptor<T>(dto, opts));
}

export class SerializeInterceptor<T> implements NestInterceptor<unknown, unknown> {
  constructor(
    private readonly dto: ClassConstructor<T>,
    private readonly opts: ClassTransformOptions = DEFAULT_TRANSFORM_OPTS
  ) { }

  intercept(_context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    return next.handle().pipe(
      map((data) => {
        if (data == null) return data;

        if (Array.isArray(data)) {
          return data.map((item: unknown) => plainToInstance(this.dto, item, this.opts));
        }

        if (typeof data === "object") {
          return plainToInstance(this.dto, data, this.opts);
        }

        // primitives pass through
        return data;
      })
    );
  }
}
