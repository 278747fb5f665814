import { vi } from "vitest";
import { v4 as uuid } from "uuid";
import {
  DescriptorResolver,
  createLogger,
  defineDescriptor,
  type LogSink,
} from "@dockyard/resolver";
import type {
  AppConfigDescriptor,
  AppConfigProvider,
  PageDescriptor,
  PageProvider,
  ServiceDescriptor,
  ServiceProvider,
} from "../src/index.js";

export function silentResolver(): DescriptorResolver {
  return new DescriptorResolver({
    logger: createLogger("DescriptorResolver", { level: "silent" }),
  });
}

export function recordingLogger(scope: string) {
  const sink = vi.fn<LogSink>();
  return { sink, logger: createLogger(scope, { level: "debug", sink }) };
}

export function page(
  ownerId: string,
  name: string,
  fields: Partial<Omit<PageDescriptor, "name">> = {}
): PageDescriptor {
  return defineDescriptor({
    ownerId,
    descriptorId: uuid(),
    version: "1.0.0",
    name,
    iconSource: `${name}.svg`,
    createView: () => name,
    ...fields,
  });
}

export function pageProvider(
  id: string,
  descriptors: PageDescriptor[]
): PageProvider {
  return { id, getPageDescriptors: () => descriptors };
}

export function service(ownerId: string, token: string): ServiceDescriptor {
  return defineDescriptor({
    ownerId,
    descriptorId: uuid(),
    version: "1.0.0",
    token,
    lifetime: "singleton",
    factory: () => token,
  });
}

export function serviceProvider(
  id: string,
  descriptors: ServiceDescriptor[]
): ServiceProvider {
  return { id, getServiceDescriptors: () => descriptors };
}

export function appConfigProvider(
  id: string,
  descriptors: AppConfigDescriptor[]
): AppConfigProvider {
  return { id, getAppConfigDescriptors: () => descriptors };
}
