import type { PackageId, PackageRef, PlatformExpr } from "@/types/branded"

export function coercePackageId(value: string): PackageId | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as PackageId
}

export function coercePackageRef(value: number): PackageRef | null {
	if (!Number.isInteger(value) || value < 0) return null
	return value as PackageRef
}

const PLATFORM_EXPR_PATTERN = /^cfg\(.+\)$/

export function coercePlatformExpr(value: string): PlatformExpr | null {
	const trimmed = value.trim()
	if (!PLATFORM_EXPR_PATTERN.test(trimmed)) return null
	return trimmed as PlatformExpr
}

export function assertPackageId(value: string): PackageId {
	const result = coercePackageId(value)
	if (!result) {
		throw new Error(`Expected package id, got: ${JSON.stringify(value)}`)
	}
	return result
}

export function assertPackageRef(value: number): PackageRef {
	const result = coercePackageRef(value)
	if (result === null) {
		throw new Error(`Expected package ref, got: ${value}`)
	}
	return result
}
