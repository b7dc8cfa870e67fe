import dbus from "dbus-next";
import type { Message } from "dbus-next";
import { z } from "zod";
import { BUS_SERVICES, ENDPOINT_NAMES, endpointForInterface, errorMessage, toWireError } from "@clia/shared";
import type { Logger } from "@clia/core";
import type { CallerIdentity } from "../policy/AccessPolicy.js";
import type { BusDispatcher } from "./BusDispatcher.js";

/** The part of a dbus-next MessageBus the transport drives. */
export interface BusConnection {
  addMethodHandler(handler: (message: Message) => boolean): void;
  requestName(name: string, flags: number): Promise<number>;
  releaseName(name: string): Promise<unknown>;
  call(message: Message): Promise<Message | null>;
  send(message: Message): void;
  disconnect(): void;
}

const DBUS_DESTINATION = "org.freedesktop.DBus";
const DBUS_PATH = "/org/freedesktop/DBus";
// DBUS_NAME_FLAG_DO_NOT_QUEUE
const NAME_FLAGS = 4;
// primary owner, or already owner
const NAME_ACQUIRED = new Set([1, 4]);

export interface BusTransport {
  start(): Promise<void>;
  stop(): Promise<void>;
}

const ConnectionCredentialsSchema = z.object({
  UnixUserID: z.object({ value: z.number().int().nonnegative() }),
  UnixGroupIDs: z.object({ value: z.array(z.number().int().nonnegative()) }).optional(),
});

/** Reads the `a{sv}` reply of GetConnectionCredentials. */
export const parseConnectionCredentials = (body: unknown): CallerIdentity | null => {
  const parsed = ConnectionCredentialsSchema.safeParse(body);
  if (!parsed.success) return null;
  return { uid: parsed.data.UnixUserID.value, gids: parsed.data.UnixGroupIDs?.value ?? [] };
};

export class DbusTransport implements BusTransport {
  private owned: string[] = [];

  constructor(
    private bus: BusConnection,
    private dispatcher: Pick<BusDispatcher, "dispatch">,
    private logger: Logger,
  ) {}

  async start(): Promise<void> {
    this.bus.addMethodHandler((message: Message) => this.accept(message));
    for (const endpoint of ENDPOINT_NAMES) {
      const { serviceName } = BUS_SERVICES[endpoint];
      const reply = await this.bus.requestName(serviceName, NAME_FLAGS);
      if (!NAME_ACQUIRED.has(reply)) {
        throw new Error(`Bus name ${serviceName} is owned by another process (reply ${reply})`);
      }
      this.owned.push(serviceName);
    }
    this.logger.info({ names: this.owned }, "bus names acquired");
  }

  async stop(): Promise<void> {
    for (const name of this.owned.splice(0)) {
      try {
        await this.bus.releaseName(name);
      } catch (error) {
        this.logger.warn({ err: error, name }, "bus name could not be released");
      }
    }
    this.bus.disconnect();
  }

  /** Claims calls addressed to one of our objects; everything else is left to other handlers. */
  private accept(message: Message): boolean {
    const endpoint = message.interface ? endpointForInterface(message.interface) : undefined;
    if (!endpoint || message.path !== BUS_SERVICES[endpoint].objectPath || !message.member) return false;
    const member = message.member;
    const payload: unknown = message.body[0];
    void this.respond(message, async () => {
      const caller = await this.resolveCaller(message.sender);
      return this.dispatcher.dispatch({
        endpoint,
        method: member,
        sender: message.sender ?? "",
        caller,
        payload: typeof payload === "string" ? payload : "",
      });
    });
    return true;
  }

  private async respond(message: Message, work: () => Promise<string>): Promise<void> {
    let reply: Message;
    try {
      reply = dbus.Message.newMethodReturn(message, "s", [await work()]);
    } catch (error) {
      const wire = toWireError(error);
      reply = new dbus.Message({
        type: dbus.MessageType.ERROR,
        errorName: wire.name,
        replySerial: message.serial ?? undefined,
        destination: message.sender,
        signature: "s",
        body: [wire.text],
      });
    }
    try {
      this.bus.send(reply);
    } catch (error) {
      this.logger.warn({ err: error, member: message.member }, "reply could not be sent");
    }
  }

  private async resolveCaller(sender: string | undefined): Promise<CallerIdentity | null> {
    if (!sender) return null;
    try {
      const reply = await this.bus.call(
        new dbus.Message({
          destination: DBUS_DESTINATION,
          path: DBUS_PATH,
          interface: DBUS_DESTINATION,
          member: "GetConnectionCredentials",
          signature: "s",
          body: [sender],
        }),
      );
      const caller = parseConnectionCredentials(reply?.body[0]);
      if (!caller) this.logger.warn({ sender }, "caller credentials could not be parsed");
      return caller;
    } catch (error) {
      this.logger.warn({ sender, reason: errorMessage(error) }, "caller credentials lookup failed");
      return null;
    }
  }
}
