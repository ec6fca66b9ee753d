/**
 * Socket event identifiers. Sent over the wire as `GameAction.X.toString()`.
 */
export enum GameAction {
  CanLogin = 0,
  Login = 1,
  LoggedIn = 2,
  LoginFailed = 3,
  ClientAction = 4,
  GameStateUpdate = 5,
  SelectionChanged = 10,
  TargetIntentDenied = 11,
  CombatStateChanged = 12,
  DispositionResult = 13,
  TravelDenied = 14,
  RegionEntered = 15,
  AttackResolved = 16
}
