import { transportTypesForLabels } from "../mvg/catalog";
import { mvgSync } from "../mvg/blocking";
import { createMvgClient } from "../mvg/client";
import type { Departure, Station } from "../models/mvg";
import { filterDepartures } from "../sensors/departureFilter";

interface ShowDeparturesArgs {
  station?: string;
  nearby?: { latitude: number; longitude: number };
  limit: number;
  offset: number;
  destinations: string[];
  lines: string[];
  products: string[];
  sync: boolean;
}

const splitList = (value: string) =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

const parseArgs = (argv: string[]): ShowDeparturesArgs => {
  const args: ShowDeparturesArgs = {
    limit: 10,
    offset: 0,
    destinations: [],
    lines: [],
    products: [],
    sync: false,
  };

  argv.forEach((arg) => {
    if (!arg.startsWith("--")) {
      args.station = [args.station, arg].filter(Boolean).join(" ");
      return;
    }

    const [key, ...rest] = arg.slice(2).split("=");
    const value = rest.join("=");
    switch (key) {
      case "station":
        args.station = value;
        break;
      case "nearby": {
        const [latitude, longitude] = value.split(",").map((entry) => Number(entry.trim()));
        if (latitude !== undefined && longitude !== undefined && Number.isFinite(latitude) && Number.isFinite(longitude)) {
          args.nearby = { latitude, longitude };
        }
        break;
      }
      case "limit":
        args.limit = Number(value) || args.limit;
        break;
      case "offset":
        args.offset = Number(value) || 0;
        break;
      case "destinations":
        args.destinations = splitList(value);
        break;
      case "lines":
        args.lines = splitList(value);
        break;
      case "products":
        args.products = splitList(value);
        break;
      case "sync":
        args.sync = true;
        break;
      default:
        console.warn(`[showDepartures] ignoring unknown option --${key}`);
    }
  });

  return args;
};

const resolveStation = async (args: ShowDeparturesArgs): Promise<Station | null> => {
  const client = createMvgClient();
  if (args.nearby) return client.findNearby(args.nearby.latitude, args.nearby.longitude);
  if (args.station) return client.findStation(args.station);
  return null;
};

const loadDepartures = async (args: ShowDeparturesArgs, station: Station): Promise<Departure[]> => {
  const transportTypes = args.products.length > 0 ? transportTypesForLabels(args.products) : null;
  const query = { limit: args.limit, offset: args.offset, transportTypes };
  if (args.sync) return mvgSync.departures(station.id, query);
  return createMvgClient().listDepartures(station.id, query);
};

const main = async () => {
  const args = parseArgs(process.argv.slice(2));
  if (!args.station && !args.nearby) {
    console.error("Usage: showDepartures --station=\"Universität, München\" | --nearby=48.15,11.58 [--limit=10]");
    process.exit(2);
  }

  const station = await resolveStation(args);
  if (!station) {
    console.error("No matching station found");
    process.exit(1);
  }

  const departures = filterDepartures(await loadDepartures(args, station), {
    destinations: args.destinations,
    lines: args.lines,
    timeOffsetMinutes: args.offset,
  });

  console.log(`${station.name}, ${station.place} (${station.id})`);
  if (departures.length === 0) {
    console.log("No departures");
    return;
  }
  departures.forEach((departure) => {
    const platform = departure.platform ? ` [${departure.platform}]` : "";
    const cancelled = departure.cancelled ? " (cancelled)" : "";
    console.log(
      `${String(departure.time_in_mins).padStart(3)} min  ${departure.line.padEnd(5)} ${departure.destination}${platform}${cancelled}`,
    );
  });
};

main().catch((error) => {
  console.error("Departure lookup failed", error);
  process.exit(1);
});
