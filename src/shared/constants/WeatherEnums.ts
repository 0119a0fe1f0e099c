/**
 * Weather enumerations for the seasonal weather model.
 *
 * @module shared/constants/WeatherEnums
 */

export enum Season {
  SPRING = "spring",
  SUMMER = "summer",
  AUTUMN = "autumn",
  WINTER = "winter",
}

export enum WeatherCondition {
  CLEAR = "clear",
  CLOUDY = "cloudy",
  OVERCAST = "overcast",
  LIGHT_RAIN = "light_rain",
  HEAVY_RAIN = "heavy_rain",
  STORM = "storm",
  FOGGY = "foggy",
  SNOWY = "snowy",
  BLIZZARD = "blizzard",
  HAIL = "hail",
}

export enum TimeOfDay {
  DAWN = "dawn",
  MORNING = "morning",
  AFTERNOON = "afternoon",
  EVENING = "evening",
  NIGHT = "night",
}
