import { describe, it, expect } from "vitest";
import { create_memory_backend } from "../../backend/memory";
import { runBackendContractTests } from "./backend-contract";

runBackendContractTests("memory", ({ batch_size, on_event }) => create_memory_backend({ batch_size, on_event }));

describe("memory backend", () => {
	it("has no artifact", async () => {
		const backend = create_memory_backend();
		const result = await backend.load({ statewide: [] });

		expect(backend.artifact_path).toBeNull();
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.artifact_path).toBeNull();
	});

	it("snapshots rows in insertion order with the first value per key", async () => {
		const backend = create_memory_backend();
		await backend.load({
			statewide: [
				{ date: "2023-06-16", water_level: 2 },
				{ date: "2023-06-15", water_level: 1 },
				{ date: "2023-06-16", water_level: 9 },
			],
			reservoirs: [
				{ station_id: "ORO", dam_name: "Oroville", lake_name: null, stream_name: null, capacity: null, year_fill: null },
			],
			reservoir_observations: [
				{ station_id: "ORO", date: "2023-06-15", water_level: 987654 },
				{ station_id: "ORO", date: "2023-06-15", water_level: 111111 },
			],
		});

		expect(backend.snapshot()).toEqual({
			statewide: [
				{ date: "2023-06-16", water_level: 2 },
				{ date: "2023-06-15", water_level: 1 },
			],
			reservoirs: [
				{ station_id: "ORO", dam_name: "Oroville", lake_name: null, stream_name: null, capacity: null, year_fill: null },
			],
			reservoir_observations: [{ station_id: "ORO", date: "2023-06-15", water_level: 987654 }],
			snow_stations: [],
			snow_observations: [],
		});
	});

	it("snapshots snow rows with the first value per key", async () => {
		const backend = create_memory_backend();
		await backend.load({
			statewide: [],
			snow_stations: [
				{ station_id: "GRZ", name: "Grizzly Ridge", elevation: 6900, river_basin: null, county: "Plumas", latitude: 39.95, longitude: -120.68 },
				{ station_id: "GRZ", name: "Duplicate", elevation: 1, river_basin: null, county: null, latitude: null, longitude: null },
			],
			snow_observations: [
				{ station_id: "GRZ", date: "2022-01-01", snow_water_equivalent: 12.5, snow_depth: 36 },
				{ station_id: "GRZ", date: "2022-01-01", snow_water_equivalent: 1, snow_depth: 1 },
			],
		});

		const { snow_stations, snow_observations } = backend.snapshot();
		expect(snow_stations.map((s) => s.name)).toEqual(["Grizzly Ridge"]);
		expect(snow_observations).toEqual([{ station_id: "GRZ", date: "2022-01-01", snow_water_equivalent: 12.5, snow_depth: 36 }]);
	});

	it("keeps rows from earlier loads when loading again", async () => {
		const backend = create_memory_backend();
		await backend.load({ statewide: [{ date: "2023-06-15", water_level: 1 }] });
		const second = await backend.load({ statewide: [{ date: "2023-06-15", water_level: 2 }] });

		expect(second.ok).toBe(true);
		if (!second.ok) return;
		expect(second.value.tables[0]?.ignored).toBe(1);
		expect(backend.snapshot().statewide).toEqual([{ date: "2023-06-15", water_level: 1 }]);
	});
});
