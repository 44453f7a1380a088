import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description'),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  /** ISO-8601, written once on insert */
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => ({
  completedIdx: index('idx_tasks_completed').on(table.completed),
  createdAtIdx: index('idx_tasks_created_at').on(table.createdAt),
  titleIdx: index('idx_tasks_title').on(table.title),
  descriptionIdx: index('idx_tasks_description').on(table.description),
}));

export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
