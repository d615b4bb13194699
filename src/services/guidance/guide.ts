import { ActivityLevelEnum } from "../../types/enums/activityLevelEnum";
import { GoalEnum } from "../../types/enums/goalEnum";
import { GUIDANCE_TABLE, GuidanceTable } from "./guidanceTable";

export type Guidance = { goal: GoalEnum; activityLevel: ActivityLevelEnum; title: string; lines: string[] };

export function guidanceFor(
  goal: GoalEnum,
  activityLevel: ActivityLevelEnum,
  table: GuidanceTable = GUIDANCE_TABLE
): Guidance {
  const base = table.byGoal[goal];
  return { goal, activityLevel, title: base.title, lines: [...base.lines, table.byActivity[activityLevel]] };
}
