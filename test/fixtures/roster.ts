import { mkdir, writeFile } from 'node:fs/promises';
import type { Student, LearningObject } from '../../src/storage/records.js';
import { Workspace } from '../../src/storage/workspace.js';

export const STUDENTS: Student[] = [
  { id: 'stu-001', name: 'Nguyen Van An' },
  { id: 'stu-002', name: 'Tran Minh Binh' },
  { id: 'stu-003', name: 'Le Thi Hoa' },
  { id: 'stu-004', name: 'Pham Thi Hoa' },
];

export const LEARNING_OBJECTS: LearningObject[] = [
  { id: 'lo-101', code: 'ALG-SUB', title: 'Solving systems of equations by substitution' },
  { id: 'lo-102', code: 'ALG-ELIM', title: 'Solving systems of equations by elimination' },
  { id: 'lo-201', code: 'GEO-PYTH', title: 'Pythagorean theorem' },
];

export const roster = {
  students: (): readonly Student[] => STUDENTS,
  learningObjects: (): readonly LearningObject[] => LEARNING_OBJECTS,
};

/**
 * Writes the roster (and optionally other collections) into a workspace's
 * data directory
 */
export async function seedWorkspace(
  workspace: Workspace,
  extra: { assignments?: unknown[]; activityLogs?: unknown[] } = {}
): Promise<void> {
  await mkdir(workspace.dataDir, { recursive: true });
  await writeFile(workspace.collectionPath('students'), JSON.stringify(STUDENTS));
  await writeFile(workspace.collectionPath('learningObjects'), JSON.stringify(LEARNING_OBJECTS));
  if (extra.assignments) {
    await writeFile(workspace.collectionPath('assignments'), JSON.stringify(extra.assignments));
  }
  if (extra.activityLogs) {
    await writeFile(workspace.collectionPath('activityLogs'), JSON.stringify(extra.activityLogs));
  }
}
