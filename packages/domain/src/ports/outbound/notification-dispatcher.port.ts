export type NotificationKind =
  | 'visit_started'
  | 'arriving_soon'
  | 'visit_in_progress'
  | 'visit_completed';

export interface NotificationRequest {
  userId: string;
  title: string;
  body: string;
  metadata: Record<string, string> & { type: NotificationKind };
}

/** Fire-and-forget delivery; callers log failures and never wait on it for control flow. */
export interface NotificationDispatcherPort {
  dispatch(request: NotificationRequest): Promise<void>;
}
