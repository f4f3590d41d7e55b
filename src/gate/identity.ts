// undefined, null, "" and whitespace all count as "nobody is signed in"
export function hasIdentity(marker: string | null | undefined): marker is string {
    return typeof marker === "string" && marker.trim().length > 0;
}
