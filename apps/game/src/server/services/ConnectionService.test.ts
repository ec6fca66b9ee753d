import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ActorType } from "../../protocol/enums/ActorType";
import { FactionId } from "../../protocol/enums/FactionId";
import { createTestCore, createTestRegions, placeActor } from "../../testing/TestWorld";
import { ConnectionService } from "./ConnectionService";
import { LoginService } from "./LoginService";

function setup() {
  const { core } = createTestCore();
  const loginService = new LoginService({ jwtSecret: "test-secret" });
  const connections = new ConnectionService({
    core,
    loginService,
    spawnPoint: createTestRegions().playerSpawn
  });
  return { core, loginService, connections };
}

describe("ConnectionService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("spawns the player at the spawn point", () => {
    const { core, loginService, connections } = setup();
    const entered = vi.fn();
    core.eventBus.on("RegionEntered", entered);

    const outcome = connections.handleLogin({ token: loginService.issueToken(7) });

    expect(outcome).toEqual({ ok: true, actorId: 7, regionId: "town", position: { x: 0, y: 0 } });
    expect(core.actors.get(7)).toMatchObject({ type: ActorType.Player, regionId: "town" });
    expect(entered).toHaveBeenCalledWith(expect.objectContaining({ actorId: 7, regionId: "town" }));
  });

  it("rejects a malformed payload", () => {
    const { connections } = setup();
    expect(connections.handleLogin({ tok: "x" })).toEqual({
      ok: false,
      error: { code: -2, msg: "Malformed login payload" }
    });
  });

  it("rejects a bad token", () => {
    const { connections } = setup();
    expect(connections.handleLogin({ token: "nope" })).toEqual({
      ok: false,
      error: { code: -1, msg: "Invalid login token" }
    });
  });

  it("rejects a second session for the same player", () => {
    const { loginService, connections } = setup();
    const token = loginService.issueToken(7);
    connections.handleLogin({ token });

    expect(connections.handleLogin({ token })).toEqual({
      ok: false,
      error: { code: -303, msg: "Your account is currently logged in, please try again in about a minute" }
    });
  });

  it("refuses an account id held by a world actor", () => {
    const { core, loginService, connections } = setup();
    placeActor(core, 1000001, ActorType.Guard, FactionId.Guards, "town", { x: 4, y: 0 });

    expect(connections.handleLogin({ token: loginService.issueToken(1000001) })).toEqual({
      ok: false,
      error: { code: -5, msg: "Account id 1000001 belongs to a world actor" }
    });
    expect(core.actors.get(1000001)?.type).toBe(ActorType.Guard);
  });

  it("despawns the player on disconnect", () => {
    const { core, loginService, connections } = setup();
    connections.handleLogin({ token: loginService.issueToken(7) });

    connections.handleDisconnect(7);

    expect(core.actors.has(7)).toBe(false);
    expect(connections.handleLogin({ token: loginService.issueToken(7) }).ok).toBe(true);
  });
});
