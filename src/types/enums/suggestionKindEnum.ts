export enum SuggestionKindEnum {
  REINFORCE = "reinforce",
  ADJUST_DOWN = "adjust-down",
  ADJUST_UP = "adjust-up",
  INSUFFICIENT_DATA = "insufficient-data",
}
