import type { WeatherCondition } from "@usedmarket/engine-core";
import type { WeatherProvider } from "@usedmarket/engine-session";

export class SettableWeather implements WeatherProvider {
  constructor(private condition: WeatherCondition = "sun") {}

  current(): WeatherCondition {
    return this.condition;
  }

  set(condition: WeatherCondition): void {
    this.condition = condition;
  }
}
