/** UUID v4 string */
export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly completed: boolean;
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

/** Fields a caller may supply on create/update, after validation */
export interface TaskDraft {
  readonly title: string;
  readonly description?: string | null | undefined;
  /** null and undefined both mean "leave unchanged" */
  readonly completed?: boolean | null | undefined;
}

export interface TaskListFilters {
  readonly completed?: boolean | undefined;
  readonly search?: string | undefined;
  readonly page?: number | undefined;
  readonly size?: number | undefined;
}

export interface TaskStats {
  readonly total: number;
  readonly completed: number;
  readonly pending: number;
}
