export enum FactionId {
  Neutral = "Neutral",
  Players = "Players",
  Monsters = "Monsters",
  Village = "Village",
  Guards = "Guards"
}
