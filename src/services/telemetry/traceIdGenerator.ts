import { v4 as uuidv4 } from 'uuid';
import type { TraceIdGenerator } from '../../domain/contracts';

export class UuidTraceIdGenerator implements TraceIdGenerator {
  generate(): string {
    return uuidv4();
  }
}
