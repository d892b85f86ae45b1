import { AppConfig } from "../config";
import { TahvelHttpError } from "../services/tahvelClient";
import { CheckerClient, CheckerDeps, runChecker } from "./checker";

describe("runChecker", () => {
  const config: AppConfig = {
    baseUrl: "https://tahvel.example.test/hois_back",
    configDir: "/tmp/tahvel-checker-test",
    pageSize: 50,
    lang: "ET",
  };

  const createClient = (overrides: Partial<CheckerClient> = {}): CheckerClient => ({
    getPlannedDates: jest.fn().mockResolvedValue(["2024-01-10T08:00:00Z"]),
    getJournalEntries: jest
      .fn()
      .mockResolvedValue([{ entryDate: "2024-01-10T08:00:00Z", lessons: 1, entryType: "SISSEKANNE_T" }]),
    getJournalDetails: jest.fn().mockResolvedValue({ totalPlannedHours: 1, capacityHours: [] }),
    getEntryTypes: jest.fn().mockResolvedValue(["SISSEKANNE_T", "SISSEKANNE_I"]),
    getStudyYears: jest.fn().mockResolvedValue([
      { id: "7", name: "2023/2024" },
      { id: "8", name: "2024/2025" },
    ]),
    getJournals: jest.fn().mockResolvedValue([
      { id: "1", name: "Programmeerimine" },
      { id: "2", name: "Andmebaasid" },
    ]),
    ...overrides,
  });

  const createDeps = (client: CheckerClient, savedCookie: string | null = "JSESSIONID=saved") => {
    const cookieStore = {
      load: jest.fn().mockReturnValue(savedCookie),
      save: jest.fn(),
      clear: jest.fn().mockReturnValue(true),
    };
    const deps: CheckerDeps = {
      config,
      cookieStore,
      createClient: jest.fn().mockReturnValue(client),
      choose: jest.fn().mockResolvedValue(1),
    };
    return { deps, cookieStore };
  };

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("cookie handling", () => {
    it("fails without a cookie", async () => {
      const { deps } = createDeps(createClient(), null);

      await expect(runChecker({ journalId: "1" }, deps)).resolves.toBe(1);
      expect(deps.createClient).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalledWith("❌ Error: No cookie provided and no saved cookie found.");
    });

    it("uses the saved cookie when none is given", async () => {
      const { deps } = createDeps(createClient());

      await runChecker({ journalId: "1" }, deps);

      expect(deps.createClient).toHaveBeenCalledWith(config, "JSESSIONID=saved");
    });

    it("prefers and saves a cookie given on the command line", async () => {
      const { deps, cookieStore } = createDeps(createClient());

      await runChecker({ journalId: "1", cookie: "JSESSIONID=given", saveCookie: true }, deps);

      expect(cookieStore.save).toHaveBeenCalledWith("JSESSIONID=given");
      expect(cookieStore.load).not.toHaveBeenCalled();
      expect(deps.createClient).toHaveBeenCalledWith(config, "JSESSIONID=given");
    });

    it("keeps going when the cookie cannot be saved", async () => {
      const { deps, cookieStore } = createDeps(createClient());
      cookieStore.save.mockImplementation(() => {
        throw new Error("EACCES");
      });

      await expect(runChecker({ journalId: "1", cookie: "JSESSIONID=given", saveCookie: true }, deps)).resolves.toBe(0);
      expect(console.error).toHaveBeenCalledWith("❌ Error for saving the cookie: EACCES");
    });

    it("deletes the saved cookie", async () => {
      const { deps, cookieStore } = createDeps(createClient());

      await expect(runChecker({ forgetCookie: true }, deps)).resolves.toBe(0);
      expect(cookieStore.clear).toHaveBeenCalled();
      expect(deps.createClient).not.toHaveBeenCalled();
    });
  });

  describe("single journal", () => {
    it("checks the given journal", async () => {
      const client = createClient();
      const { deps } = createDeps(client);

      await expect(runChecker({ journalId: "1" }, deps)).resolves.toBe(0);
      expect(client.getPlannedDates).toHaveBeenCalledWith("1");
      expect(client.getJournalDetails).not.toHaveBeenCalled();
      expect(console.log).toHaveBeenCalledWith("   Completion Rate: 100.0%");
    });

    it("fetches journal hours with details", async () => {
      const client = createClient();
      const { deps } = createDeps(client);

      await runChecker({ journalId: "1", details: true }, deps);

      expect(client.getJournalDetails).toHaveBeenCalledWith("1");
      expect(console.log).toHaveBeenCalledWith("   Total Planned Hours: 1");
    });

    it("reports an expired cookie", async () => {
      const client = createClient({
        getPlannedDates: jest.fn().mockRejectedValue(new TahvelHttpError(401, "Unauthorized", "https://tahvel.example.test/x")),
      });
      const { deps } = createDeps(client);

      await expect(runChecker({ journalId: "1" }, deps)).resolves.toBe(1);
      expect(console.error).toHaveBeenCalledWith("⚠️  Authentication failed. Your cookie may be expired or invalid.");
    });
  });

  describe("entry types", () => {
    it("lists entry types and stops", async () => {
      const client = createClient();
      const { deps } = createDeps(client);

      await expect(runChecker({ entryTypes: true }, deps)).resolves.toBe(0);
      expect(console.log).toHaveBeenCalledWith("   SISSEKANNE_I");
      expect(client.getStudyYears).not.toHaveBeenCalled();
    });
  });

  describe("interactive selection", () => {
    it("checks the chosen journal of the chosen study year", async () => {
      const client = createClient();
      const { deps } = createDeps(client);

      await expect(runChecker({}, deps)).resolves.toBe(0);
      expect(deps.choose).toHaveBeenNthCalledWith(1, "Available Study Years", [
        { id: "7", name: "2023/2024" },
        { id: "8", name: "2024/2025" },
      ]);
      expect(client.getJournals).toHaveBeenCalledWith("8");
      expect(client.getPlannedDates).toHaveBeenCalledTimes(1);
      expect(client.getPlannedDates).toHaveBeenCalledWith("2");
    });

    it("checks every journal with --all-journals", async () => {
      const client = createClient();
      const { deps } = createDeps(client);

      await expect(runChecker({ allJournals: true }, deps)).resolves.toBe(0);
      expect(deps.choose).toHaveBeenCalledTimes(1);
      expect(client.getPlannedDates).toHaveBeenCalledTimes(2);
      expect(console.log).toHaveBeenCalledWith("🎉 Successfully processed 2 out of 2 journals");
    });

    it("returns 1 when one of all journals fails", async () => {
      const client = createClient({
        getPlannedDates: jest.fn().mockRejectedValueOnce(new Error("boom")).mockResolvedValue([]),
      });
      const { deps } = createDeps(client);

      await expect(runChecker({ allJournals: true }, deps)).resolves.toBe(1);
      expect(console.error).toHaveBeenCalledWith("❌ Error for journal 1: boom");
      expect(console.log).toHaveBeenCalledWith("🎉 Successfully processed 1 out of 2 journals");
    });

    it("stops when there are no study years", async () => {
      const client = createClient({ getStudyYears: jest.fn().mockResolvedValue([]) });
      const { deps } = createDeps(client);

      await expect(runChecker({}, deps)).resolves.toBe(1);
      expect(deps.choose).not.toHaveBeenCalled();
    });

    it("stops when the study year has no journals", async () => {
      const client = createClient({ getJournals: jest.fn().mockResolvedValue([]) });
      const { deps } = createDeps(client);

      await expect(runChecker({}, deps)).resolves.toBe(1);
      expect(console.error).toHaveBeenCalledWith("❌ No journals found for the selected study year.");
    });

    it("reports a failure to list study years", async () => {
      const client = createClient({ getStudyYears: jest.fn().mockRejectedValue(new Error("offline")) });
      const { deps } = createDeps(client);

      await expect(runChecker({}, deps)).resolves.toBe(1);
      expect(console.error).toHaveBeenCalledWith("❌ Error: offline");
    });
  });
});
