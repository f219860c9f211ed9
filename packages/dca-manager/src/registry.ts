import { DcaError, NO_LENDING_PROTOCOL } from "@repo/dca-core";
import type { RoleAdmin, TokenHandler } from "./handlers";
import type { Role } from "./types";

const handlerKey = (token: string, lendingProtocolIndex: number) =>
  `HANDLER#${token}#${lendingProtocolIndex}`;

/**
 * In-memory role book and handler routing table.
 *
 * Index `0` is reserved for "no lending": handlers may be assigned to it but
 * it never carries a protocol name.
 */
export class HandlerRegistry implements RoleAdmin {
  private readonly roles = new Map<Role, Set<string>>();
  private readonly handlers = new Map<string, TokenHandler>();
  private readonly lendingProtocols = new Map<number, string>();

  grantRole(role: Role, account: string) {
    const members = this.roles.get(role) ?? new Set<string>();
    members.add(account);
    this.roles.set(role, members);
  }

  revokeRole(role: Role, account: string) {
    this.roles.get(role)?.delete(account);
  }

  hasRole(role: Role, caller: string): boolean {
    return this.roles.get(role)?.has(caller) ?? false;
  }

  addOrUpdateLendingProtocol(lendingProtocolIndex: number, name: string) {
    if (
      !Number.isInteger(lendingProtocolIndex) ||
      lendingProtocolIndex <= NO_LENDING_PROTOCOL ||
      name.trim().length === 0
    ) {
      throw new DcaError("InvalidConfiguration", { lendingProtocolIndex, name });
    }
    this.lendingProtocols.set(lendingProtocolIndex, name.trim());
  }

  getLendingProtocolName(lendingProtocolIndex: number): string {
    return this.lendingProtocols.get(lendingProtocolIndex) ?? "";
  }

  assignOrUpdateTokenHandler(
    token: string,
    lendingProtocolIndex: number,
    handler: TokenHandler,
  ) {
    if (
      lendingProtocolIndex !== NO_LENDING_PROTOCOL &&
      !this.lendingProtocols.has(lendingProtocolIndex)
    ) {
      throw new DcaError("InvalidConfiguration", { token, lendingProtocolIndex });
    }
    this.handlers.set(handlerKey(token, lendingProtocolIndex), handler);
  }

  removeTokenHandler(token: string, lendingProtocolIndex: number) {
    this.handlers.delete(handlerKey(token, lendingProtocolIndex));
  }

  getTokenHandler(token: string, lendingProtocolIndex: number): TokenHandler | undefined {
    return this.handlers.get(handlerKey(token, lendingProtocolIndex));
  }
}
