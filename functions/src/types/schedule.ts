export type FixedTimeSchedule = {
  type: 'fixed_time';
  duration: number;
  specificTimes: string[];
};

export type IntervalBasedSchedule = {
  type: 'interval_based';
  duration: number;
  intervalHours: number;
};

export type FrequencyBasedSchedule = {
  type: 'frequency_based';
  duration: number;
  timesPerDay: number;
};

export type ScheduleDefinition = FixedTimeSchedule | IntervalBasedSchedule | FrequencyBasedSchedule;

/**
 * Shape of a schedule as read back from storage. Records written before a field
 * existed (or by an older client) may be missing policy fields or carry a type
 * this build does not know.
 */
export type StoredScheduleDefinition = {
  type: string;
  duration?: number;
  specificTimes?: string[];
  intervalHours?: number;
  timesPerDay?: number;
};

export type ChecklistPriority = 'High' | 'Medium' | 'Low';

export type ChecklistItem = {
  description: string;
  priority?: ChecklistPriority;
};

export type PlanItem = {
  description: string;
  patientId: string;
  schedule: ScheduleDefinition;
  startDate?: Date | null;
};

export type ActionableStepsInput = {
  noteId: string;
  checklist: ChecklistItem[];
  plan: PlanItem[];
};

export type DueNotification = {
  noteId: string;
  patientId: string;
  stepId: string | null;
  description: string;
  nextOccurrence: string;
};
