import { ActivityLevelEnum } from "../../types/enums/activityLevelEnum";
import { GoalEnum } from "../../types/enums/goalEnum";

export type GuidanceTable = {
  byGoal: Record<GoalEnum, { title: string; lines: string[] }>;
  byActivity: Record<ActivityLevelEnum, string>;
};

export const GUIDANCE_TABLE: GuidanceTable = {
  byGoal: {
    [GoalEnum.LOSE]: {
      title: "Eating guide: lose",
      lines: [
        "Protein around 2 g per kg of body weight, spread over 3-4 meals.",
        "Fat around a quarter of your calories; fill the rest with carbohydrates, mostly vegetables, fruit and whole grains.",
        "Keep late-evening snacking light.",
        "Aim for a steady loss of up to about 1% of body weight per week.",
      ],
    },
    [GoalEnum.MAINTAIN]: {
      title: "Eating guide: maintain",
      lines: [
        "Protein around 1.6 g per kg of body weight keeps muscle while you hold steady.",
        "Keep meals regular and judge your weight on 1-2 week averages, not single days.",
        "Stay within about 0.25 kg per week in either direction.",
      ],
    },
    [GoalEnum.GAIN]: {
      title: "Eating guide: gain",
      lines: [
        "Protein around 1.8 g per kg of body weight.",
        "Put more of your carbohydrates around training.",
        "Keep fat moderate so the surplus comes from food you can train on.",
        "Aim for no more than about 0.5% of body weight gained per week.",
      ],
    },
  },
  byActivity: {
    [ActivityLevelEnum.SEDENTARY]: "Daily movement matters most for you: a 20-30 minute walk is a good start.",
    [ActivityLevelEnum.LIGHT]: "Add one or two more active days a week when you can.",
    [ActivityLevelEnum.ACTIVE]: "Refuel after training with protein and carbohydrates within a couple of hours.",
    [ActivityLevelEnum.VERY_ACTIVE]: "Eat enough on hard days; under-fuelling shows up as fatigue before it shows on the scale.",
  },
};
