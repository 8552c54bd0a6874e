import mongoose, { Schema } from 'mongoose';

// One document per sequence, e.g. { _id: 'users', seq: 42 }
export interface CounterRecord {
    _id: string;
    seq: number;
}

const counterSchema = new Schema<CounterRecord>({
    _id: {
        type: String,
        required: true,
    },
    seq: {
        type: Number,
        default: 0,
    },
});

const Counter = mongoose.model<CounterRecord>('Counter', counterSchema);

export default Counter;
