import type { LineAttachment, StopNode } from "./models";
import type { TransitProvider } from "./providers/types";

export const HUB_PREFIX = "HUB";
/** NaPTAN prefix of Underground stations and platforms. */
export const PLATFORM_PREFIX = "940G";

const PRIMARY_SENTINEL = "HUBAMR";
const SECONDARY_SENTINEL = "HUBRMD";
const DEFAULT_MAX_DEPTH = 32;

export interface ResolverOptions {
  maxDepth?: number;
}

export interface PaddedIds {
  ids: string[];
  sentinel?: string;
}

/**
 * The StopPoint endpoint answers a single id with a bare object, so a lone id is
 * sent together with a sentinel that is filtered out of the reply again.
 */
export function padSingleton(ids: string[]): PaddedIds {
  if (ids.length !== 1) {
    return { ids };
  }
  const sentinel = ids[0] === PRIMARY_SENTINEL ? SECONDARY_SENTINEL : PRIMARY_SENTINEL;
  return { ids: [...ids, sentinel], sentinel };
}

export class StopResolver {
  private readonly maxDepth: number;

  constructor(
    private readonly provider: TransitProvider,
    options: ResolverOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  async resolve(stationName: string, mode: string): Promise<LineAttachment[]> {
    const matches = await this.provider.searchStopPoints(stationName, mode);
    console.info(`[resolver] "${stationName}" (${mode}) matched ${matches.length} stop points via ${this.provider.name}`);
    if (!matches.length) {
      return [];
    }

    const candidates = await this.fetchStopPoints(matches.map((match) => match.id));
    const platformIds: string[] = [];
    for (const stopPoint of candidates) {
      if (this.isHub(stopPoint.id)) {
        platformIds.push(...this.collectPlatformIds(stopPoint));
      } else {
        platformIds.push(stopPoint.id);
      }
    }
    if (!platformIds.length) {
      return [];
    }

    const attachments: LineAttachment[] = [];
    for (const platform of await this.fetchStopPoints(platformIds)) {
      for (const line of platform.lines) {
        attachments.push({ lineId: line.id, stopPointId: platform.naptanId ?? platform.id });
      }
    }
    console.info(`[resolver] "${stationName}" resolved to ${attachments.length} line/platform pairs`);
    return attachments;
  }

  /** Swaps a hub id for its first platform descendant; other ids pass through. */
  async resolvePlatformId(id: string): Promise<string> {
    if (!this.isHub(id)) {
      return id;
    }
    const stopPoints = await this.fetchStopPoints([id]);
    const hub = stopPoints.find((stopPoint) => stopPoint.id.toUpperCase() === id.toUpperCase()) ?? stopPoints[0];
    if (!hub) {
      return id;
    }
    const [first] = this.collectPlatformIds(hub);
    return first ?? id;
  }

  private isHub(id: string): boolean {
    return id.startsWith(HUB_PREFIX);
  }

  private async fetchStopPoints(ids: string[]): Promise<StopNode[]> {
    const { ids: requested, sentinel } = padSingleton(ids);
    const stopPoints = await this.provider.getStopPoints(requested);
    return sentinel === undefined ? stopPoints : stopPoints.filter((stopPoint) => stopPoint.id !== sentinel);
  }

  /** Pre-order walk below `root`, collecting platform ids. */
  private collectPlatformIds(root: StopNode): string[] {
    const ids: string[] = [];
    const pending: Array<{ node: StopNode; depth: number }> = [];
    const pushChildren = (node: StopNode, depth: number): void => {
      const children = node.children;
      for (let index = children.length - 1; index >= 0; index -= 1) {
        pending.push({ node: children[index], depth });
      }
    };

    pushChildren(root, 1);
    while (pending.length) {
      const entry = pending.pop();
      if (!entry) {
        break;
      }
      if (entry.node.id.startsWith(PLATFORM_PREFIX)) {
        ids.push(entry.node.id);
      }
      if (entry.depth < this.maxDepth) {
        pushChildren(entry.node, entry.depth + 1);
      } else if (entry.node.children.length) {
        console.error(`[resolver] depth limit ${this.maxDepth} reached below ${root.id}`);
      }
    }
    return ids;
  }
}
