import { z } from 'zod';

/**
 * Record schemas for the persisted collections. Field names match the JSON
 * files on disk.
 */
export const StudentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export const LearningObjectSchema = z.object({
  id: z.string().min(1),
  code: z.string().min(1),
  title: z.string().min(1),
});

export const ASSIGNMENT_STATUSES = ['assigned', 'in_progress', 'completed'] as const;

export const AssignmentStatusSchema = z.enum(ASSIGNMENT_STATUSES);

export const AssignmentSchema = z.object({
  id: z.string().min(1),
  student_id: z.string().min(1),
  learning_object_id: z.string().min(1),
  quantity: z.number().int().positive(),
  note: z.string().optional(),
  created_at: z.string().datetime({ offset: true }),
  status: AssignmentStatusSchema,
});

export const ACTIVITY_SOURCE_TUTOR_COMMAND = 'tutor_command';

export const ActivityLogEntrySchema = z.object({
  id: z.string().min(1),
  student_id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  event_type: z.string().min(1),
  description: z.string(),
  source: z.string().min(1),
  details: z.record(z.unknown()).optional(),
});

export type Student = z.infer<typeof StudentSchema>;
export type LearningObject = z.infer<typeof LearningObjectSchema>;
export type AssignmentStatus = z.infer<typeof AssignmentStatusSchema>;
export type Assignment = z.infer<typeof AssignmentSchema>;
export type ActivityLogEntry = z.infer<typeof ActivityLogEntrySchema>;

/**
 * Fields supplied by callers when creating records; the store assigns ids
 * and timestamps.
 */
export interface NewAssignment {
  student_id: string;
  learning_object_id: string;
  quantity: number;
  note?: string;
}

export interface NewActivityEntry {
  student_id: string;
  event_type: string;
  description: string;
  source?: string;
  details?: Record<string, unknown>;
}
