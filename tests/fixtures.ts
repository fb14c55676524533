import { readFileSync } from "node:fs";

export interface Dataset {
  columns: string[];
  attributes: string[][];
  classes: string[];
}

export function loadDataset(name: string): Dataset {
  const text = readFileSync(new URL(`./fixtures/${name}.json`, import.meta.url), "utf8");
  const parsed: Dataset = JSON.parse(text);
  return parsed;
}

export const weather = {
  attributes: [
    ["sunny", "summer"],
    ["sunny", "summer"],
    ["cloudy", "winter"],
    ["sunny", "winter"],
  ],
  classes: ["hot", "hot", "cold", "cold"],
};
