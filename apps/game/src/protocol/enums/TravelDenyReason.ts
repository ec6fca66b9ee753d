export enum TravelDenyReason {
  UnknownActor = "UnknownActor",
  UnknownPortal = "UnknownPortal",
  ActorDead = "ActorDead",
  NotAtPortal = "NotAtPortal",
  InCombat = "InCombat"
}
