/**
 * Branded types used across core.
 */

declare const PackageIdBrand: unique symbol
declare const PackageRefBrand: unique symbol
declare const PlatformExprBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

/** Opaque cargo package id, unique per (name, version, source). */
export type PackageId = Brand<string, typeof PackageIdBrand>

/**
 * Small integer handle assigned to a package when the index is built.
 * Only valid for the index that produced it.
 */
export type PackageRef = Brand<number, typeof PackageRefBrand>

/** A rendered platform guard, always of the form `cfg(...)`. */
export type PlatformExpr = Brand<string, typeof PlatformExprBrand>
