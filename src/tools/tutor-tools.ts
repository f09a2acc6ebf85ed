import { EntityReferenceError } from '../errors/index.js';
import { settleLog } from '../logging/logger.js';
import type { RecordStore } from '../storage/record-store.js';
import type { ActivityLogEntry, Student, LearningObject } from '../storage/records.js';
import type { ToolContext, ToolOutput, ToolSpecs } from './tool-registry.js';
import {
  AssignExerciseArgsSchema,
  ActivityLogArgsSchema,
  AddNoteArgsSchema,
  ListAssignmentsArgsSchema,
  UpdateAssignmentStatusArgsSchema,
  ASSIGN_EXERCISE_TOOL,
  GET_STUDENT_ACTIVITY_LOG_TOOL,
  ADD_NOTE_TO_REPORT_TOOL,
  LIST_STUDENT_ASSIGNMENTS_TOOL,
  UPDATE_ASSIGNMENT_STATUS_TOOL,
  type ActivityPeriod,
  type ToolArgs,
} from './tool-catalog.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const EVENT_ASSIGNMENT_CREATED = 'assignment_created';
export const EVENT_TUTOR_NOTE = 'tutor_note';
export const EVENT_ASSIGNMENT_STATUS_CHANGED = 'assignment_status_changed';

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

function requireStudent(store: RecordStore, id: string): Student {
  const student = store.getStudent(id);
  if (!student) {
    throw new EntityReferenceError('student', id);
  }
  return student;
}

function requireLearningObject(store: RecordStore, id: string): LearningObject {
  const learningObject = store.getLearningObject(id);
  if (!learningObject) {
    throw new EntityReferenceError('learning_object', id);
  }
  return learningObject;
}

/**
 * Start of a rolling period. "today" begins at local midnight; the others
 * count whole days back from now.
 */
export function periodStart(period: ActivityPeriod, now: Date): Date | undefined {
  switch (period) {
    case 'today':
      return new Date(now.getFullYear(), now.getMonth(), now.getDate());
    case 'last_7_days':
      return new Date(now.getTime() - 7 * DAY_MS);
    case 'last_30_days':
      return new Date(now.getTime() - 30 * DAY_MS);
    case 'all':
      return undefined;
  }
}

async function assignExercise(args: ToolArgs['assign_exercise'], ctx: ToolContext): Promise<ToolOutput> {
  const student = requireStudent(ctx.store, args.student);
  const learningObject = requireLearningObject(ctx.store, args.learning_object);

  const assignment = await ctx.store.appendAssignment({
    student_id: student.id,
    learning_object_id: learningObject.id,
    quantity: args.quantity,
    ...(args.note !== undefined ? { note: args.note } : {}),
  });

  await ctx.store.appendActivity({
    student_id: student.id,
    event_type: EVENT_ASSIGNMENT_CREATED,
    description: `Assigned ${plural(args.quantity, 'exercise')} on ${learningObject.title}`,
    details: {
      assignment_id: assignment.id,
      quantity: assignment.quantity,
      learning_object_id: learningObject.id,
      learning_object_title: learningObject.title,
    },
  });

  await settleLog(
    ctx.logger.info('Exercise assigned', {
      operation: 'assign_exercise',
      studentId: student.id,
      assignmentId: assignment.id,
    }),
    'tool'
  );

  return {
    message: `Assigned ${plural(args.quantity, 'exercise')} on "${learningObject.title}" to ${student.name}`,
    data: {
      assignment_id: assignment.id,
      quantity: assignment.quantity,
      student_id: student.id,
      learning_object_id: learningObject.id,
    },
  };
}

function describeRange(args: ToolArgs['get_student_activity_log']): string {
  const parts: string[] = [];
  if (args.period !== 'all') parts.push(args.period.replace(/_/g, ' '));
  if (args.since !== undefined) parts.push(`since ${args.since}`);
  if (args.until !== undefined) parts.push(`until ${args.until}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

async function getStudentActivityLog(
  args: ToolArgs['get_student_activity_log'],
  ctx: ToolContext
): Promise<ToolOutput> {
  const student = requireStudent(ctx.store, args.student);

  const bounds: number[] = [];
  const start = periodStart(args.period, ctx.clock());
  if (start) bounds.push(start.getTime());
  if (args.since !== undefined) bounds.push(Date.parse(args.since));
  const from = bounds.length > 0 ? Math.max(...bounds) : Number.NEGATIVE_INFINITY;
  const to = args.until !== undefined ? Date.parse(args.until) : Number.POSITIVE_INFINITY;

  const matching: ActivityLogEntry[] = ctx.store.activityForStudent(student.id).filter(entry => {
    const at = Date.parse(entry.timestamp);
    return at >= from && at <= to;
  });
  const entries = args.limit !== undefined ? matching.slice(-args.limit) : matching;

  const range = describeRange(args);
  const message =
    matching.length === 0
      ? `No activity recorded for ${student.name}${range}`
      : entries.length < matching.length
        ? `Showing the latest ${entries.length} of ${plural(matching.length, 'activity entry', 'activity entries')} for ${student.name}${range}`
        : `Found ${plural(matching.length, 'activity entry', 'activity entries')} for ${student.name}${range}`;

  return {
    message,
    data: {
      student_id: student.id,
      student_name: student.name,
      total: matching.length,
      entries,
    },
  };
}

async function addNoteToReport(args: ToolArgs['add_note_to_report'], ctx: ToolContext): Promise<ToolOutput> {
  const student = requireStudent(ctx.store, args.student);

  const entry = await ctx.store.appendActivity({
    student_id: student.id,
    event_type: EVENT_TUTOR_NOTE,
    description: args.note,
  });

  return {
    message: `Added a note to ${student.name}'s report`,
    data: { entry_id: entry.id, student_id: student.id },
  };
}

async function listStudentAssignments(
  args: ToolArgs['list_student_assignments'],
  ctx: ToolContext
): Promise<ToolOutput> {
  const student = requireStudent(ctx.store, args.student);

  const assignments = ctx.store
    .assignments({ studentId: student.id, ...(args.status !== undefined ? { status: args.status } : {}) })
    .map(assignment => ({
      ...assignment,
      learning_object_title: ctx.store.getLearningObject(assignment.learning_object_id)?.title ?? null,
    }));

  const noun = args.status !== undefined ? `${args.status.replace(/_/g, ' ')} assignment` : 'assignment';
  return {
    message: `${student.name} has ${plural(assignments.length, noun)}`,
    data: {
      student_id: student.id,
      student_name: student.name,
      total: assignments.length,
      assignments,
    },
  };
}

async function updateAssignmentStatus(
  args: ToolArgs['update_assignment_status'],
  ctx: ToolContext
): Promise<ToolOutput> {
  const existing = ctx.store.getAssignment(args.assignment_id);
  if (!existing) {
    throw new EntityReferenceError('assignment', args.assignment_id);
  }

  if (existing.status === args.status) {
    return {
      message: `Assignment ${existing.id} is already ${args.status}`,
      data: { assignment_id: existing.id, previous_status: existing.status, status: args.status, changed: false },
    };
  }

  const updated = await ctx.store.updateAssignment(existing.id, { status: args.status });
  await ctx.store.appendActivity({
    student_id: existing.student_id,
    event_type: EVENT_ASSIGNMENT_STATUS_CHANGED,
    description: `Assignment ${existing.id} changed from ${existing.status} to ${updated.status}`,
    details: { assignment_id: existing.id, from: existing.status, to: updated.status },
  });

  return {
    message: `Assignment ${existing.id} is now ${updated.status}`,
    data: { assignment_id: existing.id, previous_status: existing.status, status: updated.status, changed: true },
  };
}

/**
 * Specs for every tutor tool, ready for the ToolRegistry
 */
export function createTutorTools(): ToolSpecs {
  return {
    assign_exercise: {
      definition: ASSIGN_EXERCISE_TOOL,
      schema: AssignExerciseArgsSchema,
      references: [
        { field: 'student', kind: 'student' },
        { field: 'learning_object', kind: 'learning_object' },
      ],
      handler: assignExercise,
    },
    get_student_activity_log: {
      definition: GET_STUDENT_ACTIVITY_LOG_TOOL,
      schema: ActivityLogArgsSchema,
      references: [{ field: 'student', kind: 'student' }],
      handler: getStudentActivityLog,
    },
    add_note_to_report: {
      definition: ADD_NOTE_TO_REPORT_TOOL,
      schema: AddNoteArgsSchema,
      references: [{ field: 'student', kind: 'student' }],
      handler: addNoteToReport,
    },
    list_student_assignments: {
      definition: LIST_STUDENT_ASSIGNMENTS_TOOL,
      schema: ListAssignmentsArgsSchema,
      references: [{ field: 'student', kind: 'student' }],
      handler: listStudentAssignments,
    },
    update_assignment_status: {
      definition: UPDATE_ASSIGNMENT_STATUS_TOOL,
      schema: UpdateAssignmentStatusArgsSchema,
      references: [{ field: 'assignment_id', kind: 'assignment' }],
      handler: updateAssignmentStatus,
    },
  };
}
