import type { Scalar } from "./row";
import type {
    Comparison,
    Condition,
    ConditionGroup,
    Ordering,
} from "./query";

/**
 * Equality comparison on a field or column.
 * Comparing against `null` compiles to `IS NULL`.
 * Use with `Query.where(...)`.
 */
export function eq(field: string, value: Scalar): Comparison {
    return {
        type: "comparison",
        field,
        operator: "=",
        value,
    };
}

/**
 * Inequality comparison. Comparing against `null` compiles to `IS NOT NULL`.
 */
export function neq(field: string, value: Scalar): Comparison {
    return {
        type: "comparison",
        field,
        operator: "!=",
        value,
    };
}

/**
 * Greater-than comparison.
 */
export function gt(field: string, value: Scalar): Comparison {
    return {
        type: "comparison",
        field,
        operator: ">",
        value,
    };
}

/**
 * Greater-than-or-equal comparison.
 */
export function gte(field: string, value: Scalar): Comparison {
    return {
        type: "comparison",
        field,
        operator: ">=",
        value,
    };
}

/**
 * Less-than comparison.
 */
export function lt(field: string, value: Scalar): Comparison {
    return {
        type: "comparison",
        field,
        operator: "<",
        value,
    };
}

/**
 * Less-than-or-equal comparison.
 */
export function lte(field: string, value: Scalar): Comparison {
    return {
        type: "comparison",
        field,
        operator: "<=",
        value,
    };
}

/**
 * SQL LIKE comparison.
 * Use `%` and `_` wildcards.
 */
export function like(field: string, pattern: string): Comparison {
    return {
        type: "comparison",
        field,
        operator: "LIKE",
        value: pattern,
    };
}

/**
 * Case-insensitive LIKE.
 */
export function ilike(field: string, pattern: string): Comparison {
    return {
        type: "comparison",
        field,
        operator: "ILIKE",
        value: pattern,
    };
}

/**
 * SQL IN comparison. An empty list matches nothing.
 */
export function inList(field: string, values: readonly Scalar[]): Comparison {
    return {
        type: "comparison",
        field,
        operator: "IN",
        value: values,
    };
}

/**
 * Inclusive range comparison.
 */
export function between(field: string, low: Scalar, high: Scalar): Comparison {
    return {
        type: "comparison",
        field,
        operator: "BETWEEN",
        value: [low, high],
    };
}

export function isNull(field: string): Comparison {
    return {
        type: "comparison",
        field,
        operator: "IS NULL",
        value: null,
    };
}

export function isNotNull(field: string): Comparison {
    return {
        type: "comparison",
        field,
        operator: "IS NOT NULL",
        value: null,
    };
}

/**
 * Group conditions with logical AND.
 */
export function and(...conditions: Condition[]): ConditionGroup {
    return {
        type: "group",
        method: "AND",
        conditions,
    };
}

/**
 * Group conditions with logical OR.
 */
export function or(...conditions: Condition[]): ConditionGroup {
    return {
        type: "group",
        method: "OR",
        conditions,
    };
}

/**
 * Negate a condition.
 */
export function not(condition: Condition): ConditionGroup {
    return {
        type: "group",
        method: "NOT",
        conditions: [condition],
    };
}

/**
 * Typed expression builder over one field.
 * @example
 * Query.from("users").where(field("age").gte(18)).orderBy(field("name").asc())
 */
export class FieldRef {
    constructor(public readonly name: string) {}

    eq(value: Scalar): Comparison {
        return eq(this.name, value);
    }

    neq(value: Scalar): Comparison {
        return neq(this.name, value);
    }

    gt(value: Scalar): Comparison {
        return gt(this.name, value);
    }

    gte(value: Scalar): Comparison {
        return gte(this.name, value);
    }

    lt(value: Scalar): Comparison {
        return lt(this.name, value);
    }

    lte(value: Scalar): Comparison {
        return lte(this.name, value);
    }

    like(pattern: string): Comparison {
        return like(this.name, pattern);
    }

    ilike(pattern: string): Comparison {
        return ilike(this.name, pattern);
    }

    in(values: readonly Scalar[]): Comparison {
        return inList(this.name, values);
    }

    between(low: Scalar, high: Scalar): Comparison {
        return between(this.name, low, high);
    }

    isNull(): Comparison {
        return isNull(this.name);
    }

    isNotNull(): Comparison {
        return isNotNull(this.name);
    }

    asc(): Ordering {
        return { field: this.name, direction: "ASC" };
    }

    desc(): Ordering {
        return { field: this.name, direction: "DESC" };
    }
}

/** Start a typed expression on `name`. */
export function field(name: string): FieldRef {
    return new FieldRef(name);
}
