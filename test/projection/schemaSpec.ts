import { DataSourceError, InvalidRequest } from "../../src/projection/errors";
import { createSchema, quoteIdentifier } from "../../src/projection/schema";
import { usersSchema } from "../models/users";

describe("Schema", () => {
    describe("createSchema", () => {
        it("should keep columns in definition order", () => {
            expect(usersSchema.columns).toEqual([
                { name: "id", type: "integer" },
                { name: "name", type: "string" },
                { name: "email", type: "string" },
                { name: "age", type: "integer" }
            ]);
        });

        it("should reject duplicate column names", () => {
            expect(() => createSchema([
                { name: "name", type: "string" },
                { name: "name", type: "string" }
            ])).toThrow("Duplicate column name: 'name'.");
        });

        it("should treat names that differ only in case as distinct", () => {
            const schema = createSchema([
                { name: "name", type: "string" },
                { name: "Name", type: "string" }
            ]);

            expect(schema.lookup("name")?.position).toBe(0);
            expect(schema.lookup("Name")?.position).toBe(1);
        });

        it("should reject an empty schema", () => {
            expect(() => createSchema([])).toThrow("A schema must define at least one column.");
        });

        it("should reject column names that are not plain identifiers", () => {
            expect(() => createSchema([
                { name: "full name", type: "string" }
            ])).toThrow('Invalid column name: "full name".');
            expect(() => createSchema([
                { name: "1st", type: "string" }
            ])).toThrow('Invalid column name: "1st".');
        });

        it("should reject a column that would replace a row's prototype", () => {
            expect(() => createSchema([
                { name: "__proto__", type: "string" },
                { name: "id", type: "integer" }
            ])).toThrow('Invalid column name: "__proto__". This name is reserved.');
        });
    });

    describe("lookup", () => {
        it("should find a column by exact name", () => {
            const binding = usersSchema.lookup("email");

            expect(binding?.name).toBe("email");
            expect(binding?.type).toBe("string");
            expect(binding?.position).toBe(2);
            expect(binding?.sqlName).toBe('"email"');
        });

        it("should not match a different case", () => {
            expect(usersSchema.lookup("Email")).toBeUndefined();
            expect(usersSchema.lookup("EMAIL")).toBeUndefined();
        });

        it("should not match names carrying SQL", () => {
            expect(usersSchema.lookup("name; DROP TABLE users")).toBeUndefined();
            expect(usersSchema.lookup('name" FROM users --')).toBeUndefined();
            expect(usersSchema.lookup("name\n")).toBeUndefined();
        });
    });

    describe("read", () => {
        it("should convert int8 strings to numbers", () => {
            const schema = createSchema([{ name: "count", type: "integer" }]);
            const count = schema.lookup("count");

            expect(count?.read("9007199254740991")).toBe(9007199254740991);
            expect(count?.read(42)).toBe(42);
        });

        it("should reject integers outside the safe range", () => {
            const schema = createSchema([{ name: "count", type: "integer" }]);

            expect(() => schema.lookup("count")?.read("9007199254740993"))
                .toThrow(DataSourceError);
        });

        it("should convert numeric strings to numbers", () => {
            const schema = createSchema([{ name: "price", type: "number" }]);

            expect(schema.lookup("price")?.read("12.50")).toBe(12.5);
        });

        it("should reject numbers too large to represent", () => {
            const schema = createSchema([{ name: "price", type: "number" }]);

            expect(() => schema.lookup("price")?.read("1e400"))
                .toThrow("Column 'price' returned a value that is not a valid number.");
            expect(() => schema.lookup("price")?.read(Infinity))
                .toThrow(DataSourceError);
        });

        it("should render timestamps as ISO strings", () => {
            const schema = createSchema([{ name: "created", type: "timestamp" }]);

            expect(schema.lookup("created")?.read(new Date(Date.UTC(2024, 0, 2, 3, 4, 5))))
                .toBe("2024-01-02T03:04:05.000Z");
        });

        it("should normalize stored timestamp strings", () => {
            const schema = createSchema([{ name: "created", type: "timestamp" }]);
            const created = schema.lookup("created");

            expect(created?.read("2024-01-01")).toBe("2024-01-01T00:00:00.000Z");
            expect(created?.read("2024-01-02T03:04:05Z")).toBe("2024-01-02T03:04:05.000Z");
            expect(() => created?.read("yesterday"))
                .toThrow("Column 'created' returned a value that is not a valid timestamp.");
        });

        it("should pass nulls through for every type", () => {
            expect(usersSchema.lookup("age")?.read(null)).toBeNull();
            expect(usersSchema.lookup("name")?.read(undefined)).toBeNull();
        });

        it("should fail when a value does not fit its column", () => {
            expect(() => usersSchema.lookup("name")?.read(17))
                .toThrow("Column 'name' returned a value that is not a valid string.");
        });
    });

    describe("coerce", () => {
        it("should parse integer filter values", () => {
            expect(usersSchema.lookup("age")?.coerce("30")).toBe(30);
        });

        it("should reject malformed integers", () => {
            expect(() => usersSchema.lookup("age")?.coerce("thirty"))
                .toThrow(new InvalidRequest("The filter value for 'age' is not a valid integer."));
            expect(() => usersSchema.lookup("age")?.coerce("3.5"))
                .toThrow(InvalidRequest);
        });

        it("should parse booleans only from true and false", () => {
            const schema = createSchema([{ name: "active", type: "boolean" }]);
            const active = schema.lookup("active");

            expect(active?.coerce("true")).toBe(true);
            expect(active?.coerce("false")).toBe(false);
            expect(active?.coerce(true)).toBe(true);
            expect(() => active?.coerce("yes")).toThrow(InvalidRequest);
        });

        it("should normalize timestamps", () => {
            const schema = createSchema([{ name: "created", type: "timestamp" }]);
            const created = schema.lookup("created");

            expect(created?.coerce("2024-01-02T03:04:05Z")).toBe("2024-01-02T03:04:05.000Z");
            expect(() => created?.coerce("not a date")).toThrow(InvalidRequest);
        });

        it("should reject numbers too large to represent", () => {
            const schema = createSchema([{ name: "price", type: "number" }]);

            expect(() => schema.lookup("price")?.coerce("1e400"))
                .toThrow(new InvalidRequest("The filter value for 'price' is not a valid number."));
        });

        it("should require a value", () => {
            expect(() => usersSchema.lookup("name")?.coerce(null))
                .toThrow("A filter on 'name' must have a value.");
        });
    });

    describe("quoteIdentifier", () => {
        it("should double embedded quotes", () => {
            expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
        });
    });
});
