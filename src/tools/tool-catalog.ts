import { z } from 'zod';
import { AssignmentStatusSchema, ASSIGNMENT_STATUSES } from '../storage/records.js';

/**
 * JSON Schema subset used to describe tool parameters to the language
 * capability
 */
export interface JSONSchema {
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required: string[];
  additionalProperties?: boolean;
}

export interface JSONSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description?: string;
  enum?: readonly string[];
  minimum?: number;
  format?: 'date-time';
  default?: unknown;
}

/**
 * The closed set of actions a tutor command can trigger
 */
export const TOOL_NAMES = [
  'assign_exercise',
  'get_student_activity_log',
  'add_note_to_report',
  'list_student_assignments',
  'update_assignment_status',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const ToolNameSchema = z.enum(TOOL_NAMES);

export function isToolName(name: string): name is ToolName {
  return ToolNameSchema.safeParse(name).success;
}

export interface ToolDefinition {
  name: ToolName;
  description: string;
  parameters: JSONSchema;
}

export const ACTIVITY_PERIODS = ['today', 'last_7_days', 'last_30_days', 'all'] as const;

export type ActivityPeriod = (typeof ACTIVITY_PERIODS)[number];

const reference = (what: string) => z.string().trim().min(1, `must name ${what}`);
const timestamp = z.string().datetime({ offset: true, message: 'must be an ISO-8601 timestamp' });

export const AssignExerciseArgsSchema = z.object({
  student: reference('a student'),
  learning_object: reference('a learning object'),
  quantity: z.number().int('must be a whole number').positive('must be greater than 0'),
  note: z.string().trim().min(1).optional(),
});

export const ActivityLogArgsSchema = z
  .object({
    student: reference('a student'),
    period: z.enum(ACTIVITY_PERIODS).default('all'),
    since: timestamp.optional(),
    until: timestamp.optional(),
    limit: z.number().int('must be a whole number').positive('must be greater than 0').optional(),
  })
  .superRefine((args, ctx) => {
    if (args.since !== undefined && args.until !== undefined && Date.parse(args.since) > Date.parse(args.until)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['until'], message: 'must not be before since' });
    }
  });

export const AddNoteArgsSchema = z.object({
  student: reference('a student'),
  note: z.string().trim().min(1, 'must not be empty'),
});

export const ListAssignmentsArgsSchema = z.object({
  student: reference('a student'),
  status: AssignmentStatusSchema.optional(),
});

export const UpdateAssignmentStatusArgsSchema = z.object({
  assignment_id: reference('an assignment'),
  status: AssignmentStatusSchema,
});

/**
 * Validated argument record per tool
 */
export interface ToolArgs {
  assign_exercise: z.infer<typeof AssignExerciseArgsSchema>;
  get_student_activity_log: z.infer<typeof ActivityLogArgsSchema>;
  add_note_to_report: z.infer<typeof AddNoteArgsSchema>;
  list_student_assignments: z.infer<typeof ListAssignmentsArgsSchema>;
  update_assignment_status: z.infer<typeof UpdateAssignmentStatusArgsSchema>;
}

export const ASSIGN_EXERCISE_TOOL: ToolDefinition = {
  name: 'assign_exercise',
  description: 'Assign a number of exercises on one learning object to one student',
  parameters: {
    type: 'object',
    properties: {
      student: {
        type: 'string',
        description: 'Student id or name as written by the tutor',
      },
      learning_object: {
        type: 'string',
        description: 'Learning object id, code or title as written by the tutor',
      },
      quantity: {
        type: 'integer',
        description: 'Number of exercises to assign',
        minimum: 1,
      },
      note: {
        type: 'string',
        description: 'Optional note for the student',
      },
    },
    required: ['student', 'learning_object', 'quantity'],
  },
};

export const GET_STUDENT_ACTIVITY_LOG_TOOL: ToolDefinition = {
  name: 'get_student_activity_log',
  description: "Read a student's activity log, optionally limited to a period or time range",
  parameters: {
    type: 'object',
    properties: {
      student: {
        type: 'string',
        description: 'Student id or name as written by the tutor',
      },
      period: {
        type: 'string',
        description: 'Rolling window ending now; "today" starts at local midnight (default: all)',
        enum: ACTIVITY_PERIODS,
        default: 'all',
      },
      since: {
        type: 'string',
        description: 'Only entries at or after this timestamp',
        format: 'date-time',
      },
      until: {
        type: 'string',
        description: 'Only entries at or before this timestamp',
        format: 'date-time',
      },
      limit: {
        type: 'integer',
        description: 'Return at most this many of the most recent entries',
        minimum: 1,
      },
    },
    required: ['student'],
  },
};

export const ADD_NOTE_TO_REPORT_TOOL: ToolDefinition = {
  name: 'add_note_to_report',
  description: "Add a tutor note to a student's progress report",
  parameters: {
    type: 'object',
    properties: {
      student: {
        type: 'string',
        description: 'Student id or name as written by the tutor',
      },
      note: {
        type: 'string',
        description: 'The note text',
      },
    },
    required: ['student', 'note'],
  },
};

export const LIST_STUDENT_ASSIGNMENTS_TOOL: ToolDefinition = {
  name: 'list_student_assignments',
  description: 'List the assignments given to a student',
  parameters: {
    type: 'object',
    properties: {
      student: {
        type: 'string',
        description: 'Student id or name as written by the tutor',
      },
      status: {
        type: 'string',
        description: 'Only assignments with this status',
        enum: ASSIGNMENT_STATUSES,
      },
    },
    required: ['student'],
  },
};

export const UPDATE_ASSIGNMENT_STATUS_TOOL: ToolDefinition = {
  name: 'update_assignment_status',
  description: 'Change the status of an existing assignment',
  parameters: {
    type: 'object',
    properties: {
      assignment_id: {
        type: 'string',
        description: 'Id of the assignment, as returned when it was created',
      },
      status: {
        type: 'string',
        description: 'New status',
        enum: ASSIGNMENT_STATUSES,
      },
    },
    required: ['assignment_id', 'status'],
  },
};
