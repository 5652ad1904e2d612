export {
  RELEASE_MILESTONES,
  DASHBOARD_HEADER,
  DASHBOARD_START,
  DASHBOARD_END,
  isReleaseMilestone,
  renderDashboard,
  patchDashboard,
  impliedMilestones,
} from './dashboard';
export type { ReleaseMilestone } from './dashboard';
