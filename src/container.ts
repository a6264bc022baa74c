import { openMembership, type MembershipLookup } from "./accessPolicy.js";
import { AnalyticsService } from "./analyticsService.js";
import type { TokenService } from "./auth.js";
import { IssueService } from "./issueService.js";
import { NotificationDispatcher } from "./notifications.js";
import { ProjectService } from "./projectService.js";
import type { Db } from "./storage.js";
import { UserService } from "./userService.js";

/** What every service needs from the outside world. */
export interface ServiceContext {
  db: Db;
  membership: MembershipLookup;
  notifications: NotificationDispatcher;
}

export interface Services {
  db: Db;
  tokens: TokenService;
  notifications: NotificationDispatcher;
  users: UserService;
  projects: ProjectService;
  issues: IssueService;
  analytics: AnalyticsService;
}

export interface ServiceOptions {
  db: Db;
  tokens: TokenService;
  notifications?: NotificationDispatcher;
  membership?: MembershipLookup;
}

export function createServices(options: ServiceOptions): Services {
  const ctx: ServiceContext = {
    db: options.db,
    membership: options.membership ?? openMembership,
    notifications: options.notifications ?? new NotificationDispatcher(),
  };
  const projects = new ProjectService(ctx);
  return {
    db: ctx.db,
    tokens: options.tokens,
    notifications: ctx.notifications,
    users: new UserService(ctx, options.tokens),
    projects,
    issues: new IssueService(ctx),
    analytics: new AnalyticsService(ctx, projects),
  };
}
