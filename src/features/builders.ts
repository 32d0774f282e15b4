/**
 * Domain feature builders. Each one reads a fixed, ordered list of signals from
 * a payload and composes them into a vector of the requested width.
 */

import { DEFAULT_FEATURE_DIM } from "../types/config.js";
import type { FeatureVector, Payload } from "../types/payload.js";
import {
  boolFlag,
  collectionSize,
  composeVector,
  delta,
  keywordFeats,
  linearFeats,
  normalize,
  normalizedCount,
  normalizedLength,
  ratio,
  readNumber,
  readString,
  readText,
} from "./signals.js";

export interface IFeatureBuilder {
  readonly name: string;
  readonly description: string;
  build(payload: Payload, inputDim?: number): FeatureVector;
}

type SignalExtractor = (payload: Payload) => number[];

function defineBuilder(name: string, description: string, extract: SignalExtractor): IFeatureBuilder {
  return {
    name,
    description,
    build(payload: Payload, inputDim: number = DEFAULT_FEATURE_DIM): FeatureVector {
      return composeVector(inputDim, extract(payload));
    },
  };
}

export const educationBuilder = defineBuilder(
  "education",
  "Grade, difficulty, answer accuracy and study-topic signals",
  (payload) => {
    const correct = readNumber(payload, "correctCount") ?? 0;
    const incorrect = readNumber(payload, "incorrectCount") ?? 0;
    const totalAttempts = correct + incorrect;

    return [
      normalize(readNumber(payload, "gradeLevel"), 12),
      normalize(readNumber(payload, "difficulty"), 10),
      normalizedLength(readString(payload, "question"), 256),
      normalize(readNumber(payload, "timeRemaining"), 60),
      ratio(correct, totalAttempts),
      ratio(incorrect, totalAttempts),
      normalizedCount(collectionSize(payload, "hints"), 10),
      ...keywordFeats(readText(payload, "topic", "question"), [
        "math", "science", "history", "language", "coding", "exam",
      ]),
      ...linearFeats(readString(payload, "equation")),
      boolFlag(payload["needsStepByStep"]),
    ];
  },
);

export const retailBuilder = defineBuilder(
  "retail",
  "Price, discount, stock level and shopping-intent signals",
  (payload) => {
    const price = readNumber(payload, "price");
    const listPrice = readNumber(payload, "listPrice");

    return [
      normalize(price, 2000),
      normalize(readNumber(payload, "discount"), 100),
      ratio(readNumber(payload, "inventory"), readNumber(payload, "capacity")),
      normalize(readNumber(payload, "basketSize"), 50),
      normalizedLength(readString(payload, "description"), 512),
      ...keywordFeats(readText(payload, "intent", "productName", "description"), [
        "sale", "new", "bundle", "premium", "limited", "subscription",
      ]),
      normalize(delta(price, listPrice), 500),
      boolFlag(payload["loyalCustomer"]),
      ...linearFeats(readString(payload, "pricingFormula")),
    ];
  },
);

export const travelBuilder = defineBuilder(
  "travel",
  "Distance, duration, budget, itinerary progress and trip-note signals",
  (payload) => [
    normalize(readNumber(payload, "distanceKm"), 20_000),
    normalize(readNumber(payload, "durationHours"), 240),
    normalize(readNumber(payload, "budgetUsd"), 20_000),
    ratio(readNumber(payload, "completedSteps"), readNumber(payload, "totalSteps")),
    normalizedCount(collectionSize(payload, "layovers"), 6),
    ...keywordFeats(readText(payload, "notes", "destination", "intent"), [
      "flight", "hotel", "car", "visa", "delay", "emergency",
    ]),
    boolFlag(payload["international"]),
    normalizedLength(readString(payload, "destination"), 64),
    ...linearFeats(readString(payload, "routingFormula")),
  ],
);

export const healthBuilder = defineBuilder(
  "health",
  "Vital signs, symptom keywords and medication adherence signals",
  (payload) => [
    normalize(readNumber(payload, "heartRate"), 200),
    normalize(readNumber(payload, "temperatureC"), 45),
    normalize(readNumber(payload, "oxygenSaturation"), 100),
    normalize(readNumber(payload, "severity"), 5),
    normalizedLength(readString(payload, "symptoms"), 256),
    ...keywordFeats(readText(payload, "symptoms", "diagnosis"), [
      "pain", "fever", "cough", "injury", "allergy", "infection",
    ]),
    boolFlag(payload["isEmergency"]),
    normalize(readNumber(payload, "medicationAdherence"), 100),
    normalizedCount(collectionSize(payload, "allergies"), 10),
    ...linearFeats(readString(payload, "dosageFormula")),
  ],
);

export const financeBuilder = defineBuilder(
  "finance",
  "Loan amount, term, rate, risk and approval-ratio signals",
  (payload) => [
    normalize(readNumber(payload, "amount"), 100_000),
    normalize(readNumber(payload, "termMonths"), 360),
    normalize(readNumber(payload, "interestRate"), 30),
    normalize(readNumber(payload, "riskScore"), 100),
    ratio(readNumber(payload, "approvedAmount"), readNumber(payload, "requestedAmount")),
    boolFlag(payload["requiresManualReview"]),
    ...keywordFeats(readText(payload, "intent", "useCase"), [
      "loan", "investment", "budget", "savings", "fraud", "insurance",
    ]),
    normalizedCount(collectionSize(payload, "documents"), 20),
    ...linearFeats(readString(payload, "amortizationFormula")),
  ],
);

export const hospitalityBuilder = defineBuilder(
  "hospitality",
  "Occupancy, stay length, guest rating and preference signals",
  (payload) => [
    ratio(readNumber(payload, "occupiedRooms"), readNumber(payload, "totalRooms")),
    normalize(readNumber(payload, "stayLength"), 30),
    normalize(readNumber(payload, "guestRating"), 5),
    normalizedCount(collectionSize(payload, "amenities"), 25),
    ...keywordFeats(readText(payload, "preferences", "purpose"), [
      "business", "leisure", "family", "spa", "event", "conference",
    ]),
    boolFlag(payload["vipGuest"]),
    ratio(readNumber(payload, "cleanRooms"), readNumber(payload, "totalRooms")),
    normalizedLength(readString(payload, "roomType"), 64),
    ...linearFeats(readString(payload, "pricingModel")),
  ],
);

export const logisticsBuilder = defineBuilder(
  "logistics",
  "Shipment weight, distance, priority and delivery-status signals",
  (payload) => [
    normalize(readNumber(payload, "weightKg"), 1000),
    normalize(readNumber(payload, "distanceKm"), 10_000),
    normalize(readNumber(payload, "priority"), 10),
    ratio(readNumber(payload, "deliveredStops"), readNumber(payload, "totalStops")),
    normalizedCount(collectionSize(payload, "stops"), 20),
    ...keywordFeats(readText(payload, "status", "notes"), [
      "delayed", "loaded", "customs", "handoff", "failed", "signed",
    ]),
    boolFlag(payload["hazardous"]),
    normalizedLength(readString(payload, "routeId"), 48),
    ...linearFeats(readString(payload, "routingFormula")),
  ],
);

export const manufacturingBuilder = defineBuilder(
  "manufacturing",
  "Throughput, downtime, defect rate and line-alert signals",
  (payload) => [
    normalize(readNumber(payload, "throughput"), 10_000),
    normalize(readNumber(payload, "downtimeMinutes"), 1_440),
    normalize(readNumber(payload, "defectRate"), 100),
    ratio(readNumber(payload, "completedUnits"), readNumber(payload, "plannedUnits")),
    normalizedLength(readString(payload, "lineStatus"), 128),
    ...keywordFeats(readText(payload, "lineStatus", "alerts"), [
      "blocked", "maintenance", "overheat", "quality", "materials", "idle",
    ]),
    boolFlag(payload["maintenanceRequired"]),
    normalize(readNumber(payload, "temperatureC"), 200),
    normalizedCount(collectionSize(payload, "alerts"), 15),
  ],
);

export const agricultureBuilder = defineBuilder(
  "agriculture",
  "Soil, rainfall, growth stage and crop-issue signals",
  (payload) => [
    normalize(readNumber(payload, "soilMoisture"), 100),
    normalize(readNumber(payload, "rainfallMm"), 500),
    normalize(readNumber(payload, "growthStage"), 10),
    normalize(readNumber(payload, "temperatureC"), 50),
    ratio(readNumber(payload, "healthyPlants"), readNumber(payload, "totalPlants")),
    normalizedLength(readString(payload, "crop"), 64),
    ...keywordFeats(readText(payload, "cropStatus", "issues"), [
      "pest", "drought", "disease", "harvest", "fertilizer", "yield",
    ]),
    boolFlag(payload["irrigationNeeded"]),
    normalize(readNumber(payload, "soilPh"), 14),
  ],
);

export const energyBuilder = defineBuilder(
  "energy",
  "Grid load, production, storage and grid-status signals",
  (payload) => [
    normalize(readNumber(payload, "consumptionMw"), 100_000),
    normalize(readNumber(payload, "productionMw"), 100_000),
    normalize(readNumber(payload, "renewableShare"), 1),
    ratio(readNumber(payload, "batteryLevel"), readNumber(payload, "batteryCapacity")),
    normalizedCount(collectionSize(payload, "outages"), 20),
    ...keywordFeats(readText(payload, "gridStatus", "alerts"), [
      "peak", "shortage", "maintenance", "surplus", "derate", "fault",
    ]),
    boolFlag(payload["peakDemand"]),
    normalizedLength(readString(payload, "region"), 48),
    ...linearFeats(readString(payload, "loadForecastFormula")),
  ],
);

export const securityBuilder = defineBuilder(
  "security",
  "Alert level, sensor activity, incident ratio and alarm-keyword signals",
  (payload) => [
    normalize(readNumber(payload, "alertLevel"), 10),
    normalize(readNumber(payload, "sensorsTriggered"), 50),
    ratio(readNumber(payload, "resolvedIncidents"), readNumber(payload, "openIncidents")),
    normalizedLength(readString(payload, "location"), 128),
    ...keywordFeats(readText(payload, "summary", "alerts"), [
      "intrusion", "fire", "door", "window", "panic", "tamper",
    ]),
    boolFlag(payload["verified"]),
    normalizedCount(collectionSize(payload, "cameras"), 50),
    ...linearFeats(readString(payload, "thresholdFormula")),
  ],
);

export const entertainmentBuilder = defineBuilder(
  "entertainment",
  "Duration, rating, genre keywords and audience signals",
  (payload) => [
    normalize(readNumber(payload, "durationMinutes"), 240),
    normalize(readNumber(payload, "rating"), 10),
    normalizedLength(readString(payload, "title"), 96),
    ...keywordFeats(readText(payload, "genre", "mood", "query"), [
      "action", "comedy", "drama", "live", "kids", "sports",
    ]),
    ratio(readNumber(payload, "ticketsSold"), readNumber(payload, "capacity")),
    boolFlag(payload["isLive"]),
    normalize(readNumber(payload, "audienceAge"), 100),
    normalizedLength(readString(payload, "query"), 256),
    ...linearFeats(readString(payload, "scheduleFormula")),
  ],
);

export const BUILT_IN_BUILDERS: readonly IFeatureBuilder[] = [
  educationBuilder,
  retailBuilder,
  travelBuilder,
  healthBuilder,
  financeBuilder,
  hospitalityBuilder,
  logisticsBuilder,
  manufacturingBuilder,
  agricultureBuilder,
  energyBuilder,
  securityBuilder,
  entertainmentBuilder,
];
