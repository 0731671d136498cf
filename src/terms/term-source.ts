import type { Semester } from '../schedules/weekday';

export type CurrentTerm = {
  academicYear: string;
  semester: Semester;
  updatedAt: Date;
};

/**
 * Narrow read access to the current term. Decisions read it once at the
 * start and use that value for the whole call.
 */
export interface TermSource {
  getCurrentTerm(): Promise<CurrentTerm>;
}

export const TERM_SOURCE = 'TERM_SOURCE';
