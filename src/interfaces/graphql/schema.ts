import {
  GraphQLBoolean,
  GraphQLFloat,
  GraphQLInt,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
} from 'graphql';
import type { Device } from '../../domain/index.js';
import type { QueryService } from '../../application/query-events.js';
import { toEventView } from '../../application/event-view.js';
import type { EventView } from '../../application/event-view.js';

export interface GraphQLContext {
  queries: QueryService;
}

interface EventsArgs {
  deviceId?: string | null;
  max?: number | null;
  since?: number | null;
}

const deviceType = new GraphQLObjectType<Device, GraphQLContext>({
  name: 'Device',
  fields: {
    id: { type: new GraphQLNonNull(GraphQLString) },
    enabled: { type: new GraphQLNonNull(GraphQLBoolean) },
    name: { type: GraphQLString },
    description: { type: GraphQLString },
    sensors: { type: new GraphQLList(new GraphQLNonNull(GraphQLString)) },
  },
});

// creationTime and since are epoch seconds, past the 32-bit range of Int.
const eventType = new GraphQLObjectType<EventView, GraphQLContext>({
  name: 'Event',
  fields: {
    deviceId: { type: new GraphQLNonNull(GraphQLString) },
    creationTime: { type: new GraphQLNonNull(GraphQLFloat) },
    temperature: { type: GraphQLFloat },
    motion: { type: GraphQLBoolean },
  },
});

const queryType = new GraphQLObjectType<unknown, GraphQLContext>({
  name: 'Query',
  fields: {
    devices: {
      type: new GraphQLList(new GraphQLNonNull(deviceType)),
      resolve: (_root, _args, ctx: GraphQLContext) => ctx.queries.listDevices(),
    },
    events: {
      type: new GraphQLList(new GraphQLNonNull(eventType)),
      args: {
        deviceId: { type: GraphQLString },
        max: { type: GraphQLInt },
        since: { type: GraphQLFloat },
      },
      resolve: async (_root, args: EventsArgs, ctx: GraphQLContext) => {
        const events = await ctx.queries.listEvents(
          args.deviceId ?? '',
          args.max ?? 0,
          args.since ?? 0,
        );
        return events.map(toEventView);
      },
    },
  },
});

export const schema = new GraphQLSchema({ query: queryType });
