import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { Logger, isNotFound, settleLog } from '../logging/logger.js';
import { StoreIOError, EntityReferenceError, type EntityKind } from '../errors/index.js';
import { atomicWrite } from './atomic-write.js';
import { Workspace, type CollectionName } from './workspace.js';
import {
  StudentSchema,
  LearningObjectSchema,
  AssignmentSchema,
  ActivityLogEntrySchema,
  ACTIVITY_SOURCE_TUTOR_COMMAND,
  type Student,
  type LearningObject,
  type Assignment,
  type AssignmentStatus,
  type ActivityLogEntry,
  type NewAssignment,
  type NewActivityEntry,
} from './records.js';

export interface RecordStoreOptions {
  /** Source of timestamps for new records */
  clock?: () => Date;
  logger?: Logger;
}

export interface AssignmentFilter {
  studentId?: string;
  status?: AssignmentStatus;
}

export interface AssignmentPatch {
  status?: AssignmentStatus;
  note?: string;
}

/**
 * In-memory copy of one collection file
 */
class Collection<T extends { id: string }> {
  private items: T[] = [];
  private index = new Map<string, T>();

  constructor(
    readonly name: CollectionName,
    readonly path: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  get records(): readonly T[] {
    return this.items;
  }

  get(id: string): T | undefined {
    return this.index.get(id);
  }

  async load(): Promise<number> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.replace([]);
        return 0;
      }
      throw new StoreIOError(this.path, `Failed to read ${this.name} collection`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StoreIOError(this.path, `Collection ${this.name} is not valid JSON`, { cause: error });
    }

    const parsed = z.array(this.schema).safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue';
      throw new StoreIOError(this.path, `Collection ${this.name} has an invalid record at ${where}`);
    }

    const seen = new Set<string>();
    for (const record of parsed.data) {
      if (seen.has(record.id)) {
        throw new StoreIOError(this.path, `Collection ${this.name} repeats id "${record.id}"`);
      }
      seen.add(record.id);
    }

    this.replace(parsed.data);
    return parsed.data.length;
  }

  /**
   * Applies a mutation and persists the whole collection. The in-memory state
   * is restored if the write fails.
   */
  async mutate(apply: (items: T[]) => T[]): Promise<void> {
    const previous = this.items;
    const next = apply([...previous]);
    this.replace(next);

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await atomicWrite(this.path, JSON.stringify(next, null, 2) + '\n');
    } catch (error) {
      this.replace(previous);
      throw new StoreIOError(this.path, `Failed to persist ${this.name} collection`, { cause: error });
    }
  }

  private replace(items: T[]): void {
    this.items = items;
    this.index = new Map(items.map(item => [item.id, item]));
  }
}

function byTimestamp(a: ActivityLogEntry, b: ActivityLogEntry): number {
  return Date.parse(a.timestamp) - Date.parse(b.timestamp);
}

/**
 * RecordStore - The only reader and writer of the collection files
 *
 * Students and learning objects are read-only seed data. Assignments and
 * activity entries are appended (and assignments updated) through this class,
 * each mutation flushing the full collection with an atomic rename.
 *
 * Not safe for concurrent mutation; callers serving several commands at once
 * must serialize them (see CommandPipeline).
 */
export class RecordStore {
  private readonly studentsCollection: Collection<Student>;
  private readonly learningObjectsCollection: Collection<LearningObject>;
  private readonly assignmentsCollection: Collection<Assignment>;
  private readonly activityCollection: Collection<ActivityLogEntry>;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private isLoaded = false;

  constructor(workspace: Workspace, options: RecordStoreOptions = {}) {
    this.studentsCollection = new Collection('students', workspace.collectionPath('students'), StudentSchema);
    this.learningObjectsCollection = new Collection(
      'learningObjects',
      workspace.collectionPath('learningObjects'),
      LearningObjectSchema
    );
    this.assignmentsCollection = new Collection(
      'assignments',
      workspace.collectionPath('assignments'),
      AssignmentSchema
    );
    this.activityCollection = new Collection(
      'activityLogs',
      workspace.collectionPath('activityLogs'),
      ActivityLogEntrySchema
    );
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? new Logger({ level: 'info', path: workspace.logPath('tutor-command.log') });
  }

  get loaded(): boolean {
    return this.isLoaded;
  }

  /**
   * Loads every collection into memory. Missing files load as empty.
   * @throws StoreIOError when a file is unreadable, malformed or repeats an id
   */
  async load(): Promise<void> {
    const counts = {
      students: await this.studentsCollection.load(),
      learningObjects: await this.learningObjectsCollection.load(),
      assignments: await this.assignmentsCollection.load(),
      activityLogs: await this.activityCollection.load(),
    };
    this.isLoaded = true;
    await settleLog(
      this.logger.info('Record store loaded', { operation: 'store_load', ...counts }),
      'store'
    );
  }

  now(): Date {
    return this.clock();
  }

  students(): readonly Student[] {
    return this.studentsCollection.records;
  }

  learningObjects(): readonly LearningObject[] {
    return this.learningObjectsCollection.records;
  }

  getStudent(id: string): Student | undefined {
    return this.studentsCollection.get(id);
  }

  getLearningObject(id: string): LearningObject | undefined {
    return this.learningObjectsCollection.get(id);
  }

  getAssignment(id: string): Assignment | undefined {
    return this.assignmentsCollection.get(id);
  }

  /**
   * Whether a record of the given kind exists
   */
  has(kind: EntityKind, id: string): boolean {
    switch (kind) {
      case 'student':
        return this.getStudent(id) !== undefined;
      case 'learning_object':
        return this.getLearningObject(id) !== undefined;
      case 'assignment':
        return this.getAssignment(id) !== undefined;
    }
  }

  assignments(filter: AssignmentFilter = {}): Assignment[] {
    return this.assignmentsCollection.records.filter(
      a =>
        (filter.studentId === undefined || a.student_id === filter.studentId) &&
        (filter.status === undefined || a.status === filter.status)
    );
  }

  /**
   * All activity entries in chronological order; ties keep insertion order
   */
  activityLog(): ActivityLogEntry[] {
    return [...this.activityCollection.records].sort(byTimestamp);
  }

  activityForStudent(studentId: string): ActivityLogEntry[] {
    return this.activityCollection.records.filter(e => e.student_id === studentId).sort(byTimestamp);
  }

  /**
   * Creates one assignment record
   * @throws EntityReferenceError when the student or learning object is unknown
   */
  async appendAssignment(input: NewAssignment): Promise<Assignment> {
    this.requireExisting('student', input.student_id);
    this.requireExisting('learning_object', input.learning_object_id);

    const assignment = AssignmentSchema.parse({
      id: `asg_${randomUUID()}`,
      student_id: input.student_id,
      learning_object_id: input.learning_object_id,
      quantity: input.quantity,
      ...(input.note !== undefined ? { note: input.note } : {}),
      created_at: this.clock().toISOString(),
      status: 'assigned',
    });

    await this.assignmentsCollection.mutate(items => [...items, assignment]);
    await settleLog(
      this.logger.debug('Assignment appended', { operation: 'store_append', assignmentId: assignment.id }),
      'store'
    );
    return assignment;
  }

  /**
   * Updates one assignment in place
   * @throws EntityReferenceError when the assignment is unknown
   */
  async updateAssignment(id: string, patch: AssignmentPatch): Promise<Assignment> {
    const existing = this.getAssignment(id);
    if (!existing) {
      throw new EntityReferenceError('assignment', id);
    }

    const updated = AssignmentSchema.parse({ ...existing, ...patch });
    await this.assignmentsCollection.mutate(items => items.map(a => (a.id === id ? updated : a)));
    await settleLog(
      this.logger.debug('Assignment updated', { operation: 'store_update', assignmentId: id }),
      'store'
    );
    return updated;
  }

  /**
   * Appends one activity entry for an existing student
   */
  async appendActivity(input: NewActivityEntry): Promise<ActivityLogEntry> {
    this.requireExisting('student', input.student_id);

    const entry = ActivityLogEntrySchema.parse({
      id: `act_${randomUUID()}`,
      student_id: input.student_id,
      timestamp: this.clock().toISOString(),
      event_type: input.event_type,
      description: input.description,
      source: input.source ?? ACTIVITY_SOURCE_TUTOR_COMMAND,
      ...(input.details !== undefined ? { details: input.details } : {}),
    });

    await this.activityCollection.mutate(items => [...items, entry]);
    await settleLog(
      this.logger.debug('Activity appended', { operation: 'store_append', activityId: entry.id }),
      'store'
    );
    return entry;
  }

  private requireExisting(kind: EntityKind, id: string): void {
    if (!this.has(kind, id)) {
      throw new EntityReferenceError(kind, id);
    }
  }
}
