/**
 * Unit Test Setup
 */

process.env.NODE_ENV = "test";
