import { ClusterDefaults, resolveValue } from "../config/defaults";
import type { ChecksumAlgorithm, ImageConfig, ManifestTree } from "../types/schemas";

export type ImageType = "iso" | "import" | "vztmpl" | "unknown";

// Proxmox VE content types per file extension.
export const EXTENSION_TYPES: Readonly<Record<string, ImageType>> = {
  "iso": "iso",
  "img": "import",
  "qcow2": "import",
  "raw": "import",
  "raw.xz": "import",
  "vmdk": "import",
  "tar.xz": "vztmpl",
  "tar.gz": "vztmpl",
  "tar.zst": "vztmpl",
};

const DEBIAN_VERSIONS: Readonly<Record<string, string>> = {
  bookworm: "12",
  trixie: "13",
};

export const DEFAULT_CHECKSUM_ALGORITHM: ChecksumAlgorithm = "sha256";

export interface PreparedImage {
  key: string;
  targetNode: string;
  targetDatastore: string;
  type: ImageType;
  fileName: string;
  /** `<datastore>:<type>/<file>`, the Proxmox volume the image lands in. */
  volumeId: string;
  /** Absent for images that are placed on the datastore by hand. */
  url?: string;
  checksum?: string;
  checksumAlgorithm?: ChecksumAlgorithm;
}

export function imageTypeOf(extension: string): ImageType {
  return EXTENSION_TYPES[extension.toLowerCase()] ?? "unknown";
}

/** Resolves `versions.<key>` references; anything else is used as is. */
export function resolveRelease(release: string | number, versions: Record<string, string>): string {
  if (typeof release === "string" && release.startsWith("versions.")) {
    return versions[release.slice("versions.".length)] ?? release;
  }
  return String(release);
}

/** Download URL of the image, or undefined when its distro has no known source. */
export function imageUrl(image: ImageConfig, versions: Record<string, string>): string | undefined {
  if (image.url !== undefined) {
    return image.url;
  }
  const extension = image.extension.toLowerCase();
  const arch = image.arch ?? "amd64";
  const version = resolveRelease(image.release, versions);

  switch (image.distro) {
    case "debian":
      return `https://cloud.debian.org/images/cloud/${version}/latest/debian-${DEBIAN_VERSIONS[version] ?? version}-genericcloud-${arch}.qcow2`;
    case "ubuntu":
      if (extension === "qcow2" || extension === "img") {
        return `https://cloud-images.ubuntu.com/${version}/current/${version}-server-cloudimg-${arch}.img`;
      }
      if (imageTypeOf(extension) === "vztmpl") {
        return `https://images.linuxcontainers.org/images/ubuntu/${version}/${arch}/cloud/${image.build_date ?? ""}/rootfs.tar.xz`;
      }
      return undefined;
    case "talos":
      return `https://factory.talos.dev/image/${image.schematic ?? ""}/v${version}/nocloud-${arch}.${extension}`;
    default:
      return undefined;
  }
}

export function imageFileName(image: ImageConfig, versions: Record<string, string>): string {
  if (image.file_name !== undefined) {
    return image.file_name;
  }
  const { distro } = image;
  const extension = image.extension.toLowerCase();
  const arch = image.arch ?? "amd64";
  const version = resolveRelease(image.release, versions);

  switch (imageTypeOf(extension)) {
    case "iso":
      return distro === "talos"
        ? `talos-${version}-nocloud-${arch}.iso`
        : `${distro}-${version}-${arch}.iso`;
    case "import":
      if (distro === "talos") {
        return `talos-${version}-nocloud-${arch}.${extension}`;
      }
      if (distro === "ubuntu") {
        return `ubuntu-${version}-server-cloudimg-${arch}.${extension}`;
      }
      if (distro === "debian") {
        return `debian-${DEBIAN_VERSIONS[version] ?? version}-genericcloud-${arch}.${extension}`;
      }
      return `${distro}-${version}-${arch}.${extension}`;
    case "vztmpl": {
      const buildDate = String(image.build_date ?? "").replace(/[:_]/g, "");
      return `${distro}-${version}-cloud-${arch}-${buildDate}.${extension}`;
    }
    default:
      return `${distro}-${version}-${arch}.${extension}`;
  }
}

export function prepareImages(
  tree: Pick<ManifestTree, "images" | "versions">,
  defaults: ClusterDefaults,
): Record<string, PreparedImage> {
  const prepared: Record<string, PreparedImage> = {};
  for (const key of Object.keys(tree.images).sort()) {
    const image = tree.images[key];
    const type = imageTypeOf(image.extension);
    const targetDatastore = resolveValue(image.target_datastore, undefined, defaults.fileStorageClass);
    const fileName = imageFileName(image, tree.versions);
    prepared[key] = {
      key,
      targetNode: resolveValue(image.target_node, undefined, defaults.targetNode),
      targetDatastore,
      type,
      fileName,
      volumeId: `${targetDatastore}:${type}/${fileName}`,
      url: imageUrl(image, tree.versions),
      checksum: image.checksum,
      checksumAlgorithm: image.checksum === undefined
        ? undefined
        : resolveValue(image.checksum_algorithm, undefined, DEFAULT_CHECKSUM_ALGORITHM),
    };
  }
  return prepared;
}
