import { describe, expect, it } from "vitest";
import {
  BountyApplicationSchema,
  BookingSchema,
  ConversationSchema,
  HumanSchema,
  ReviewSchema,
} from "../models.js";
import { alice, bob } from "../test-utils.js";
import {
  formatApplications,
  formatBooking,
  formatBookingList,
  formatConversation,
  formatHumanList,
  formatHumanProfile,
  formatReviews,
  formatSkills,
  summarizeHuman,
} from "./format.js";

describe("human formatting", () => {
  it("summarizes a human on one line", () => {
    expect(summarizeHuman(HumanSchema.parse(alice))).toBe(
      "Alice (human_test_001) | in San Francisco | $45/hr | skills: Photography, Packages | rating: 4.8",
    );
  });

  it("lists humans or says none were found", () => {
    expect(formatHumanList([])).toBe("No humans found matching your criteria.");
    expect(formatHumanList([HumanSchema.parse(bob)])).toBe(
      "Found 1 human(s):\n  - Bob (human_test_002) | in New York | $55/hr | skills: Photography, In-Person Meetings",
    );
  });

  it("prints only the profile fields that are set", () => {
    const human = HumanSchema.parse({ id: "h1", name: "Cara", bio: "Courier", completedTasks: 3 });
    expect(formatHumanProfile(human)).toBe("Name: Cara\nID: h1\nBio: Courier\nCompleted tasks: 3");
  });
});

describe("review and skill formatting", () => {
  it("fills in missing ratings and comments", () => {
    const reviews = [
      ReviewSchema.parse({ id: "r1", rating: 5, comment: "Great" }),
      ReviewSchema.parse({ id: "r2" }),
    ];
    expect(formatReviews(reviews)).toBe("2 review(s):\n  - 5/5: Great\n  - ?/5: No comment");
    expect(formatReviews([])).toBe("No reviews found for this human.");
  });

  it("joins skill names", () => {
    expect(formatSkills([{ name: "Packages" }, { name: "Errands" }])).toBe(
      "Available skills: Packages, Errands",
    );
    expect(formatSkills([])).toBe("No skills found.");
  });
});

describe("booking formatting", () => {
  const booking = BookingSchema.parse({
    id: "booking_001",
    taskTitle: "Photograph storefront",
    status: "confirmed",
  });

  it("shows unknown hours as ?", () => {
    expect(formatBooking(booking)).toBe(
      "Booking booking_001: Photograph storefront | Status: confirmed | Hours: ?",
    );
  });

  it("lists bookings", () => {
    expect(formatBookingList([booking])).toBe(
      "1 booking(s):\n  - booking_001: Photograph storefront [confirmed]",
    );
    expect(formatBookingList([])).toBe("No bookings found.");
  });
});

describe("formatApplications", () => {
  it("truncates long messages", () => {
    const application = BountyApplicationSchema.parse({
      id: "app_001",
      humanId: "human_test_002",
      humanName: "Bob",
      message: "x".repeat(100),
    });
    expect(formatApplications([application])).toBe(
      `1 application(s):\n  - Bob (human_test_002): $?/hr | ${"x".repeat(80)}...`,
    );
  });

  it("says when there are none", () => {
    expect(formatApplications([])).toBe("No applications yet.");
  });
});

describe("formatConversation", () => {
  it("prints the subject and each message", () => {
    const conversation = ConversationSchema.parse({
      id: "conv_001",
      subject: "Photos",
      messages: [
        { id: "m1", sender: "agent", content: "Free Tuesday?" },
        { id: "m2", sender: "human", content: "Yes" },
      ],
    });
    expect(formatConversation(conversation)).toBe(
      "Conversation: Photos (ID: conv_001)\n  [agent]: Free Tuesday?\n  [human]: Yes",
    );
  });
});
