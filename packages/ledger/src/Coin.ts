/**
 * A fungible, splittable amount of base units held by a caller.
 *
 * The ledger never creates value: a payment Coin handed to an operation is
 * drained once the operation commits and the amounts live on as ledger
 * balances. An aborted operation leaves the Coin untouched.
 */
export class Coin {
  private amount: bigint;

  constructor(amount: bigint) {
    if (amount < 0n) {
      throw new Error("Coin value cannot be negative");
    }
    this.amount = amount;
  }

  static zero(): Coin {
    return new Coin(0n);
  }

  value(): bigint {
    return this.amount;
  }

  /** Move `amount` out of this coin into a new one. */
  split(amount: bigint): Coin {
    if (amount < 0n || amount > this.amount) {
      throw new Error(`Cannot split ${amount} from a coin holding ${this.amount}`);
    }
    this.amount -= amount;
    return new Coin(amount);
  }

  /** Absorb `other`, leaving it empty. */
  merge(other: Coin): this {
    if (other === this) {
      return this;
    }
    this.amount += other.amount;
    other.amount = 0n;
    return this;
  }

  /** Empty the coin and return what it held. */
  drain(): bigint {
    return this.split(this.amount).value();
  }
}
