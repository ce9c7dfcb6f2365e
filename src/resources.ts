import { getInboxMessages, getMessage, listLabels, searchMessages } from "./gmail/index.js"
import { RESOURCE_SCHEME, type ResourceDefinition } from "./registry.js"

export const RESOURCES: ResourceDefinition[] = [
  {
    name: "labels",
    path: "labels",
    uri: `${RESOURCE_SCHEME}://labels`,
    description: "All Gmail labels and their IDs",
    read: ctx => listLabels(ctx)
  },
  {
    name: "inbox",
    path: "inbox",
    uri: `${RESOURCE_SCHEME}://inbox`,
    description: "The 10 most recent inbox messages",
    read: ctx => getInboxMessages(ctx, 10)
  },
  {
    name: "message",
    path: "message",
    uri: `${RESOURCE_SCHEME}://message/{id}`,
    description: "Full content of one message",
    argument: "id",
    read: (ctx, id) => getMessage(ctx, id)
  },
  {
    name: "search",
    path: "search",
    uri: `${RESOURCE_SCHEME}://search/{query}`,
    description: "Up to 10 messages matching a Gmail search query",
    argument: "query",
    read: (ctx, query) => searchMessages(ctx, query, 10)
  }
]
