/**
 * administration.ts
 *
 * The ledgers only ever ask `isAdministrator(caller)`. TwoStepAdministration
 * is the single-administrator gate shipped with the engine: a hand-over must
 * be accepted by the nominee, and renouncing leaves the gate closed for good.
 */

import type { AdministrationEvents, Principal } from "@stakevest/types";
import { LedgerError } from "./errors";
import { LedgerEmitter } from "./events";

export interface Administration {
  isAdministrator(caller: Principal): boolean;
}

export function requireAdministrator(admin: Administration, caller: Principal): void {
  if (!admin.isAdministrator(caller)) throw new LedgerError("OnlyAdministrator");
}

export class TwoStepAdministration
  extends LedgerEmitter<AdministrationEvents>
  implements Administration
{
  private current: Principal | null;
  private pending: Principal | null = null;

  constructor(administrator: Principal) {
    super();
    if (administrator === "") throw new LedgerError("ZeroAddress");
    this.current = administrator;
  }

  get administrator(): Principal | null {
    return this.current;
  }

  get pendingAdministrator(): Principal | null {
    return this.pending;
  }

  isAdministrator(caller: Principal): boolean {
    return this.current !== null && caller === this.current;
  }

  /** Nominate a successor; takes effect once they accept. */
  transferAdministration(to: Principal, sender: Principal): void {
    requireAdministrator(this, sender);
    if (to === "") throw new LedgerError("ZeroAddress");
    this.pending = to;
  }

  acceptAdministration(sender: Principal): void {
    if (this.pending === null || sender !== this.pending) {
      throw new LedgerError("OnlyPendingAdministrator");
    }
    const from = this.current ?? "";
    this.current = sender;
    this.pending = null;
    this.emit("AdministratorChanged", { from, to: sender });
  }

  renounceAdministration(sender: Principal): void {
    requireAdministrator(this, sender);
    this.current = null;
    this.pending = null;
    this.emit("AdministratorChanged", { from: sender, to: null });
  }
}
