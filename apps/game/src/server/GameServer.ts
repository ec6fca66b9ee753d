import fs from "fs";
import http from "http";
import https from "https";
import path from "path";
import express from "express";
import { Server as SocketIOServer, type Socket } from "socket.io";
import { GameAction } from "../protocol/enums/GameAction";
import { clientActionPayloadSchema } from "../protocol/payloads/ClientPayloads";
import { FactionCatalog } from "../world/factions/FactionCatalog";
import { RegionCatalog } from "../world/regions/RegionCatalog";
import { SystemServerClock, type ServerClock } from "../world/ServerClock";
import { dispatchClientAction, type ActionContext } from "./actions";
import { CombatCore } from "./CombatCore";
import { sweepIntervalTicks, type ServerConfig } from "./config";
import { ClientEventForwarder } from "./events/ClientEventForwarder";
import { ConnectionService, type LoginOutcome } from "./services/ConnectionService";
import { IntentAuditService } from "./services/IntentAuditService";
import { LoginService } from "./services/LoginService";

type OutgoingMessage = { actorId: number; action: GameAction; payload: unknown };

/**
 * Authoritative shard: HTTP health/query routes, socket.io sessions and
 * the fixed-rate tick that drives the legality core.
 */
export class GameServer {
  private readonly app = express();
  private readonly server: http.Server | https.Server;
  private readonly io: SocketIOServer;
  private readonly clock: ServerClock;
  private readonly loginService: LoginService;
  private readonly intentAudit: IntentAuditService;
  private core: CombatCore | null = null;
  private connectionService: ConnectionService | null = null;
  private eventForwarder: ClientEventForwarder | null = null;
  private detachIntentAudit: (() => void) | null = null;
  private tickTimer: NodeJS.Timeout | null = null;

  private readonly socketsByActorId = new Map<number, Socket>();
  private outgoingNow: OutgoingMessage[] = [];
  private outgoingNext: OutgoingMessage[] = [];

  constructor(
    private readonly config: ServerConfig,
    clock: ServerClock = new SystemServerClock()
  ) {
    this.clock = clock;
    this.loginService = new LoginService({ jwtSecret: config.jwtSecret });
    this.intentAudit = new IntentAuditService(config.intentAudit, clock);

    this.app.get("/health", (_req, res) => {
      res.json({ ok: true });
    });

    this.app.get("/actors/:id/combat-state", (req, res) => {
      if (!this.core) {
        res.status(503).json({ error: "Server is starting" });
        return;
      }
      const actorId = Number(req.params.id);
      if (!Number.isInteger(actorId) || !this.core.actors.has(actorId)) {
        res.status(404).json({ error: "Unknown actor" });
        return;
      }
      res.json(this.core.getCombatState(actorId));
    });

    this.server = this.buildNodeServer();
    this.io = new SocketIOServer(this.server, {
      cors: { origin: "*" },
      allowUpgrades: true,
      transports: ["polling", "websocket"],
      pingInterval: 25_000,
      pingTimeout: 20_000,
      maxHttpBufferSize: 1_000_000
    });

    this.io.on("connection", (socket) => this.manageConnection(socket));
  }

  async start(): Promise<void> {
    const factions = await FactionCatalog.load(this.config.staticAssetsPath);
    const regions = await RegionCatalog.load(this.config.staticAssetsPath);

    const core = new CombatCore({
      clock: this.clock,
      factions,
      regions,
      disengageSeconds: this.config.disengageSeconds,
      engagementOnTargeted: this.config.engagementOnTargeted,
      attackIntervalTicks: this.config.attackIntervalTicks,
      sweepIntervalTicks: sweepIntervalTicks(this.config)
    });
    core.spawnPlacedActors();

    this.connectionService = new ConnectionService({
      core,
      loginService: this.loginService,
      spawnPoint: regions.playerSpawn
    });

    this.eventForwarder = new ClientEventForwarder({
      eventBus: core.eventBus,
      enqueueUserMessage: (actorId, action, payload) => this.enqueueUserMessage(actorId, action, payload)
    });
    this.eventForwarder.attach();

    this.detachIntentAudit = this.intentAudit.attach(core.eventBus);
    this.intentAudit.start();

    this.core = core;
    this.beginTickLoop();

    await new Promise<void>((resolve, reject) => {
      this.server.once("error", (err) => reject(err));
      this.server.listen(this.config.port, () => resolve());
    });
    const protocol = this.config.useHttps ? "https" : "http";
    console.log(`[server] Listening on ${protocol}://localhost:${this.config.port}`);
  }

  async stop(): Promise<void> {
    this.endTickLoop();
    this.eventForwarder?.detach();
    this.detachIntentAudit?.();
    this.detachIntentAudit = null;
    this.intentAudit.shutdown();
    this.core?.eventBus.clear();
    await new Promise<void>((resolve) => {
      this.io.close(() => resolve());
    });
    console.log("[server] Stopped");
  }

  // Lifecycle & Server Control
  private beginTickLoop() {
    if (this.tickTimer) return;
    this.tickTimer = setInterval(() => this.runServerTick(), this.config.tickMs);
  }

  private endTickLoop() {
    if (!this.tickTimer) return;
    clearInterval(this.tickTimer);
    this.tickTimer = null;
    this.outgoingNow.length = 0;
    this.outgoingNext.length = 0;
  }

  private runServerTick() {
    // Input is handled immediately as it arrives; the core advances timers and attacks
    this.core?.tick();

    // Update Clients System
    const tmp = this.outgoingNow;
    this.outgoingNow = this.outgoingNext;
    this.outgoingNext = tmp;
    this.outgoingNext.length = 0;
    if (this.outgoingNow.length > 0) {
      this.flushQueuedPackets(this.outgoingNow);
    }
  }

  // Networking & Packet Queueing
  private enqueueUserMessage(actorId: number, action: GameAction, payload: unknown) {
    this.outgoingNext.push({ actorId, action, payload });
  }

  private flushQueuedPackets(packets: OutgoingMessage[]) {
    const userActions = new Map<number, Array<[GameAction, unknown]>>();

    for (const packet of packets) {
      const queue = userActions.get(packet.actorId);
      if (queue) {
        queue.push([packet.action, packet.payload]);
      } else {
        userActions.set(packet.actorId, [[packet.action, packet.payload]]);
      }
    }

    for (const [actorId, actions] of userActions.entries()) {
      const socket = this.socketsByActorId.get(actorId);
      if (!socket) continue;
      socket.emit(GameAction.GameStateUpdate.toString(), actions);
    }
  }

  private buildNodeServer() {
    if (!this.config.useHttps) return http.createServer(this.app);

    const defaultCert = path.join(__dirname, "..", "..", "..", "..", "certs", "localhost.pem");
    const defaultKey = path.join(__dirname, "..", "..", "..", "..", "certs", "localhost-key.pem");
    const certPath = this.config.sslCertPath ?? defaultCert;
    const keyPath = this.config.sslKeyPath ?? defaultKey;

    if (!fs.existsSync(certPath) || !fs.existsSync(keyPath)) {
      throw new Error(
        `USE_HTTPS=true but TLS files were not found.\n  SSL_CERT_PATH: ${certPath}\n  SSL_KEY_PATH:  ${keyPath}`
      );
    }

    const cert = fs.readFileSync(certPath);
    const key = fs.readFileSync(keyPath);
    return https.createServer({ cert, key }, this.app);
  }

  // Networking & Client Connection Handling
  private manageConnection(socket: Socket) {
    let connectedActorId: number | null = null;

    // Server -> client: CanLogin, with ONE argument: empty array.
    socket.emit(GameAction.CanLogin.toString(), []);

    socket.on(GameAction.Login.toString(), (payload: unknown) => {
      if (!this.connectionService || connectedActorId !== null) return;

      let result: LoginOutcome;
      try {
        result = this.connectionService.handleLogin(payload);
      } catch (err) {
        console.error("[Connection] Login failed unexpectedly:", err);
        result = { ok: false, error: { code: -1, msg: "Login failed" } };
      }
      if (!result.ok) {
        socket.emit(GameAction.LoginFailed.toString(), [result.error]);
        setTimeout(() => {
          if (socket.connected) socket.disconnect(true);
        }, 25);
        return;
      }

      connectedActorId = result.actorId;
      this.socketsByActorId.set(result.actorId, socket);
      socket.emit(GameAction.LoggedIn.toString(), [
        { actorId: result.actorId, regionId: result.regionId, position: result.position }
      ]);
    });

    socket.on(GameAction.ClientAction.toString(), (payload: unknown) => {
      try {
        const clientAction = clientActionPayloadSchema.safeParse(payload);
        if (!clientAction.success) {
          console.warn("[protocol] failed to decode client action:", clientAction.error.message);
          return;
        }
        if (!this.core) return;

        const ctx = this.buildActionContext(connectedActorId, this.core);
        dispatchClientAction(clientAction.data.type, ctx, clientAction.data.data);
      } catch (err) {
        // keep server alive; a handler bug must not take the shard down
        console.warn("[protocol] failed to handle client action:", err instanceof Error ? err.message : err);
      }
    });

    socket.on("disconnect", () => {
      if (connectedActorId === null) return;
      const actorId = connectedActorId;
      connectedActorId = null;
      if (this.socketsByActorId.get(actorId) === socket) {
        this.socketsByActorId.delete(actorId);
      }
      this.connectionService?.handleDisconnect(actorId);
    });
  }

  // Action Context Builder
  private buildActionContext(actorId: number | null, core: CombatCore): ActionContext {
    return {
      actorId,
      currentTick: core.currentTick,
      core,
      reply: (action, payload) => {
        if (actorId !== null) this.enqueueUserMessage(actorId, action, payload);
      }
    };
  }
}
