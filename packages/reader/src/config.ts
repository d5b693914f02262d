import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// =============================================================================
// 包检测
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** 展开环境变量中的 ~ */
export function expandHome(dir: string): string {
	if (dir === "~") return homedir();
	if (dir.startsWith("~/")) return homedir() + dir.slice(1);
	return dir;
}

/**
 * 获取包根目录（package.json 所在目录）。
 * - 对于 Node.js (dist/)：从 dist/ 向上查找
 * - 对于 tsx / vitest (src/)：从 src/ 向上查找
 */
export function getPackageDir(): string {
	// 允许通过环境变量覆盖（打包进其他发行版时有用）
	const envDir = process.env.FOLIO_PACKAGE_DIR;
	if (envDir) {
		return expandHome(envDir);
	}

	// 从 __dirname 向上遍历直到找到 package.json
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	// 回退（不应发生）
	return __dirname;
}

/** 获取 package.json 的路径 */
export function getPackageJsonPath(): string {
	return join(getPackageDir(), "package.json");
}

// =============================================================================
// 应用配置（来自 package.json folioConfig）
// =============================================================================

const PackageJsonSchema = Type.Object({
	version: Type.String(),
	folioConfig: Type.Optional(
		Type.Object({
			name: Type.Optional(Type.String()),
			configDir: Type.Optional(Type.String()),
		}),
	),
});

type PackageJson = Static<typeof PackageJsonSchema>;

function readPackageJson(): PackageJson {
	const path = getPackageJsonPath();
	const pkg: unknown = JSON.parse(readFileSync(path, "utf-8"));
	if (!Value.Check(PackageJsonSchema, pkg)) {
		throw new Error(`Invalid package.json: ${path}`);
	}
	return pkg;
}

const pkg = readPackageJson();

export const APP_NAME: string = pkg.folioConfig?.name || "folio";
export const CONFIG_DIR_NAME: string = pkg.folioConfig?.configDir || ".folio";
export const VERSION: string = pkg.version;

// 例如：FOLIO_CONFIG_DIR
export const ENV_CONFIG_DIR = `${APP_NAME.toUpperCase()}_CONFIG_DIR`;

// =============================================================================
// 用户配置路径 (~/.folio/*)
// =============================================================================

/** 获取配置目录（例如：~/.folio/） */
export function getConfigDir(): string {
	const envDir = process.env[ENV_CONFIG_DIR];
	if (envDir) {
		return expandHome(envDir);
	}
	return join(homedir(), CONFIG_DIR_NAME);
}

/** 获取 settings.json 的路径 */
export function getSettingsPath(): string {
	return join(getConfigDir(), "settings.json");
}
