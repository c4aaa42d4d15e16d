/**
 * Task Router
 * Picks a team template for a free-text task by keyword
 *
 * Rules are checked in order and the first hit wins:
 * - research:  research, investigate, find, search
 * - daily_ops: brief, daily, status, summary
 * - content:   content, write, create, generate
 * - security:  security, audit, vulnerability, threat
 * Anything else goes to the catch-all template.
 */

export interface RouteRule {
  template: string;
  keywords: readonly string[];
}

export interface RouteDecision {
  template: string;
  /** Keyword that selected the template; null for the catch-all. */
  matchedKeyword: string | null;
  reasoning: string;
}

export const DEFAULT_ROUTE_RULES: readonly RouteRule[] = [
  { template: "research", keywords: ["research", "investigate", "find", "search"] },
  { template: "daily_ops", keywords: ["brief", "daily", "status", "summary"] },
  { template: "content", keywords: ["content", "write", "create", "generate"] },
  { template: "security", keywords: ["security", "audit", "vulnerability", "threat"] },
];

export class TaskRouter {
  private readonly rules: readonly RouteRule[];
  private readonly fallbackTemplate: string;

  constructor(options: { rules?: readonly RouteRule[]; fallbackTemplate?: string } = {}) {
    this.rules = options.rules ?? DEFAULT_ROUTE_RULES;
    this.fallbackTemplate = options.fallbackTemplate ?? "full_stack";
  }

  /**
   * Plain substring match on the lower-cased task, so "findings" counts as "find".
   */
  public route(task: string): RouteDecision {
    const normalized = task.toLowerCase();

    for (const rule of this.rules) {
      const keyword = rule.keywords.find((kw) => normalized.includes(kw));
      if (keyword) {
        return {
          template: rule.template,
          matchedKeyword: keyword,
          reasoning: `Matched "${keyword}" -> ${rule.template}`,
        };
      }
    }

    return {
      template: this.fallbackTemplate,
      matchedKeyword: null,
      reasoning: `No keyword matched -> ${this.fallbackTemplate}`,
    };
  }
}

/**
 * Convenience function for a single routing decision with the default rules
 */
export function routeTaskToTemplate(task: string): RouteDecision {
  return new TaskRouter().route(task);
}
