import { ActorType } from "../../protocol/enums/ActorType";
import { FactionId } from "../../protocol/enums/FactionId";
import { loginPayloadSchema } from "../../protocol/payloads/ClientPayloads";
import type { Position } from "../../world/Location";
import type { SpawnPoint } from "../../world/regions/RegionCatalog";
import type { CombatCore } from "../CombatCore";
import { LoginFailedError, type LoginService } from "./LoginService";

export interface ConnectionServiceDependencies {
  core: CombatCore;
  loginService: LoginService;
  spawnPoint: SpawnPoint;
}

export type LoginOutcome =
  | { ok: true; actorId: number; regionId: string; position: Position }
  | { ok: false; error: { code: number; msg: string } };

/**
 * Service for managing player sessions.
 * Handles the login flow (token check, player spawn) and disconnect cleanup.
 * Socket I/O stays in GameServer; this service only decides.
 */
export class ConnectionService {
  constructor(private readonly deps: ConnectionServiceDependencies) {}

  /**
   * Verifies a Login payload and spawns the player at the configured spawn point.
   *
   * @returns the bound actor, or the error to send back as LoginFailed
   */
  handleLogin(payload: unknown): LoginOutcome {
    try {
      const login = loginPayloadSchema.safeParse(payload);
      if (!login.success) {
        throw new LoginFailedError(-2, "Malformed login payload");
      }

      const actorId = this.deps.loginService.verifyLogin(login.data.token);
      const existing = this.deps.core.actors.get(actorId);
      if (existing && existing.type !== ActorType.Player) {
        throw new LoginFailedError(-5, `Account id ${actorId} belongs to a world actor`);
      }
      if (existing) {
        throw new LoginFailedError(-303, "Your account is currently logged in, please try again in about a minute");
      }

      const { regionId, x, y } = this.deps.spawnPoint;
      const spawned = this.deps.core.spawnActor({
        id: actorId,
        type: ActorType.Player,
        factionId: FactionId.Players,
        regionId,
        position: { x, y }
      });
      if (!spawned.ok) {
        throw new LoginFailedError(-4, `Cannot spawn player: ${spawned.reason}`);
      }
      // Announces the region and applies its overrides
      this.deps.core.enterRegion(actorId, regionId, { x, y });

      console.log(`[Connection] Player ${actorId} logged in at ${regionId} (${x}, ${y})`);
      return { ok: true, actorId, regionId, position: { x, y } };
    } catch (err) {
      if (err instanceof LoginFailedError) {
        console.warn(`[Connection] Login rejected: ${err.msg}`);
        return { ok: false, error: { code: err.code, msg: err.msg } };
      }
      throw err;
    }
  }

  /**
   * Removes the player's actor and every reference to it.
   */
  handleDisconnect(actorId: number): void {
    if (this.deps.core.despawnActor(actorId)) {
      console.log(`[Connection] Player ${actorId} disconnected`);
    }
  }
}
