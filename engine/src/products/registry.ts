/**
 * apptrack Engine — Handler Registry
 *
 * Maps the handler names used in the configuration to product factories.
 * Every call returns a fresh instance.
 */

import { BaseProduct } from "./base-product";
import { DummyProduct } from "./dummy";
import { MakeMkvProduct } from "./makemkv";
import {
  FIREFOX_WIN,
  FIREFOX_WIN64,
  MozillaProduct,
  THUNDERBIRD_WIN,
} from "./mozilla";

export type ProductFactory = () => BaseProduct;

export class HandlerRegistry {
  private factories = new Map<string, ProductFactory>();

  register(name: string, factory: ProductFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /** A new product for handler `name`, null when unknown. */
  create(name: string): BaseProduct | null {
    const factory = this.factories.get(name);
    return factory ? factory() : null;
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }
}

/** Registry of the handlers shipped with apptrack. */
export function createDefaultRegistry(): HandlerRegistry {
  return new HandlerRegistry()
    .register("dummy", () => new DummyProduct())
    .register("firefox-win", () => new MozillaProduct(FIREFOX_WIN))
    .register("firefox-win64", () => new MozillaProduct(FIREFOX_WIN64))
    .register("thunderbird-win", () => new MozillaProduct(THUNDERBIRD_WIN))
    .register("makemkv", () => new MakeMkvProduct());
}
