import { TetherError } from "../errors.js";

/**
 * Resolve the component name a URL designates.
 *
 * `app://home?x=1` → `home`, `/hello/world` → `hello`, `menu.bar` → `menu.bar`.
 */
export function componentNameFromUrl(rawUrl: string): string {
  const cut = rawUrl.search(/[?#]/);
  const bare = cut === -1 ? rawUrl : rawUrl.slice(0, cut);

  let name: string;
  const schemeAt = bare.indexOf("://");
  if (schemeAt !== -1) {
    const rest = bare.slice(schemeAt + 3);
    const slash = rest.indexOf("/");
    name = slash === -1 ? rest : rest.slice(0, slash);
  } else {
    const segments = bare.split("/").filter((segment) => segment.length > 0);
    name = segments[0] ?? "";
  }

  name = name.trim().toLowerCase();
  if (name.length === 0) {
    throw new TetherError("TETHER_NOT_FOUND", `no component name in url "${rawUrl}"`);
  }
  return name;
}
