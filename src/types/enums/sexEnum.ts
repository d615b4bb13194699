export enum SexEnum {
  MALE = "male",
  FEMALE = "female",
}
