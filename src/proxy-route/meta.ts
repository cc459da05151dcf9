import type { ProxyRoute } from "./types.js";

/** Annotation holding the identifier of the route in Caddy. */
export const EXTERNAL_NAME_ANNOTATION = "caddy-route-reconciler/external-name";

export function getExternalName(cr: ProxyRoute): string | undefined {
  const name = cr.metadata.annotations[EXTERNAL_NAME_ANNOTATION];
  return name ? name : undefined;
}

export function setExternalName(cr: ProxyRoute, name: string): void {
  cr.metadata.annotations[EXTERNAL_NAME_ANNOTATION] = name;
}
