export const ENDPOINT_NAMES = ["chat", "history", "user"] as const;
export type EndpointName = (typeof ENDPOINT_NAMES)[number];

export interface BusServiceIdentifier {
  endpoint: EndpointName;
  serviceName: string;
  objectPath: string;
  interfaceName: string;
}

const SERVICE_NAMESPACE = ["io", "clia"] as const;

const identifierFor = (endpoint: EndpointName, segment: string): BusServiceIdentifier => {
  const serviceName = [...SERVICE_NAMESPACE, segment].join(".");
  return {
    endpoint,
    serviceName,
    objectPath: `/${[...SERVICE_NAMESPACE, segment].join("/")}`,
    interfaceName: serviceName,
  };
};

export const BUS_SERVICES: Record<EndpointName, BusServiceIdentifier> = {
  chat: identifierFor("chat", "Chat"),
  history: identifierFor("history", "History"),
  user: identifierFor("user", "User"),
};

export const endpointForInterface = (interfaceName: string): EndpointName | undefined =>
  ENDPOINT_NAMES.find((name) => BUS_SERVICES[name].interfaceName === interfaceName);
